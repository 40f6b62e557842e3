import { DatabaseError, DatabaseService, Queryable, UNIQUE_VIOLATION } from '../config/database';
import { QueryResultRow } from 'pg';
import { HoldingType } from '../types/common/enums';
import { CreateHoldingInput, HoldingRow, IHolding, UpdateHoldingInput } from '../types/models/holding';
import {
  HoldingExistsError,
  HoldingNotFoundError,
  HoldingRepositoryError,
} from '../utils/errors/repository-error';

const HOLDING_COLUMNS = 'id, type, symbol, quantity, cost_basis, created_at, updated_at';

/**
 * Maps a holdings row to the domain model. NUMERIC columns arrive as strings from pg.
 */
export const toHolding = (row: HoldingRow): IHolding => ({
  id: Number(row.id),
  type: row.type,
  symbol: row.symbol,
  quantity: Number(row.quantity),
  costBasis: Number(row.cost_basis),
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

/**
 * Repository for the holdings table.
 *
 * At most one holding exists per (type, symbol); `create` reports a duplicate
 * as HoldingExistsError, and `update`/`delete` report a missing id as
 * HoldingNotFoundError. Any other database failure is wrapped in
 * HoldingRepositoryError.
 */
export class HoldingRepository {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Creates and initializes a new instance of HoldingRepository
   */
  public static async initialize(): Promise<HoldingRepository> {
    const dbService = await DatabaseService.getInstance();
    return new HoldingRepository(dbService);
  }

  async findAll(): Promise<IHolding[]> {
    const rows = await this.select(
      `SELECT ${HOLDING_COLUMNS} FROM holdings ORDER BY type, symbol`,
      [],
      'Failed to list holdings',
    );
    return rows.map(toHolding);
  }

  async findByType(type: HoldingType): Promise<IHolding[]> {
    const rows = await this.select(
      `SELECT ${HOLDING_COLUMNS} FROM holdings WHERE type = $1 ORDER BY symbol`,
      [type],
      `Failed to list ${type} holdings`,
    );
    return rows.map(toHolding);
  }

  async findById(id: number): Promise<IHolding | null> {
    const rows = await this.select(
      `SELECT ${HOLDING_COLUMNS} FROM holdings WHERE id = $1`,
      [id],
      `Failed to find holding ${id}`,
    );
    return rows.length > 0 ? toHolding(rows[0]) : null;
  }

  async findBySymbol(type: HoldingType, symbol: string): Promise<IHolding | null> {
    const rows = await this.select(
      `SELECT ${HOLDING_COLUMNS} FROM holdings WHERE type = $1 AND symbol = $2`,
      [type, symbol],
      `Failed to find ${type} holding ${symbol}`,
    );
    return rows.length > 0 ? toHolding(rows[0]) : null;
  }

  async create(input: CreateHoldingInput): Promise<IHolding> {
    try {
      const result = await this.db.query<HoldingRow>(
        `INSERT INTO holdings (type, symbol, quantity, cost_basis)
         VALUES ($1, $2, $3, $4)
         RETURNING ${HOLDING_COLUMNS}`,
        [input.type, input.symbol, input.quantity, input.costBasis],
      );
      return toHolding(result.rows[0]);
    } catch (error) {
      if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw new HoldingExistsError(input.type, input.symbol);
      }
      console.error('[HOLDINGS] Error creating holding:', error);
      throw new HoldingRepositoryError(
        `Failed to create ${input.type} holding ${input.symbol}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Applies a partial update; fields left undefined keep their stored value
   */
  async update(id: number, input: UpdateHoldingInput): Promise<IHolding> {
    let rows: HoldingRow[];
    try {
      const result = await this.db.query<HoldingRow>(
        `UPDATE holdings
         SET quantity = COALESCE($2, quantity),
             cost_basis = COALESCE($3, cost_basis),
             updated_at = NOW()
         WHERE id = $1
         RETURNING ${HOLDING_COLUMNS}`,
        [id, input.quantity ?? null, input.costBasis ?? null],
      );
      rows = result.rows;
    } catch (error) {
      console.error('[HOLDINGS] Error updating holding:', error);
      throw new HoldingRepositoryError(
        `Failed to update holding ${id}`,
        error instanceof Error ? error : undefined,
      );
    }

    if (rows.length === 0) {
      throw new HoldingNotFoundError(id);
    }
    return toHolding(rows[0]);
  }

  async delete(id: number): Promise<void> {
    let rowCount: number | null;
    try {
      const result = await this.db.query('DELETE FROM holdings WHERE id = $1', [id]);
      rowCount = result.rowCount;
    } catch (error) {
      console.error('[HOLDINGS] Error deleting holding:', error);
      throw new HoldingRepositoryError(
        `Failed to delete holding ${id}`,
        error instanceof Error ? error : undefined,
      );
    }

    if (!rowCount) {
      throw new HoldingNotFoundError(id);
    }
  }

  /**
   * Inserts holdings in one transaction, skipping any (type, symbol) that already exists
   * @returns Number of rows inserted
   */
  async bulkCreate(inputs: readonly CreateHoldingInput[]): Promise<number> {
    if (inputs.length === 0) {
      return 0;
    }

    try {
      return await this.db.transaction(async (client: Queryable) => {
        let inserted = 0;
        for (const input of inputs) {
          const result = await client.query(
            `INSERT INTO holdings (type, symbol, quantity, cost_basis)
             VALUES ($1, $2, $3, $4)
             ON CONFLICT (type, symbol) DO NOTHING`,
            [input.type, input.symbol, input.quantity, input.costBasis],
          );
          inserted += result.rowCount ?? 0;
        }
        return inserted;
      });
    } catch (error) {
      console.error('[HOLDINGS] Error bulk creating holdings:', error);
      throw new HoldingRepositoryError(
        'Failed to bulk create holdings',
        error instanceof Error ? error : undefined,
      );
    }
  }

  async isEmpty(): Promise<boolean> {
    const rows = await this.select<{ count: string }>(
      'SELECT COUNT(*) AS count FROM holdings',
      [],
      'Failed to count holdings',
    );
    return rows.length === 0 || Number(rows[0].count) === 0;
  }

  private async select<T extends QueryResultRow = HoldingRow>(
    text: string,
    params: unknown[],
    failureMessage: string,
  ): Promise<T[]> {
    try {
      const result = await this.db.query<T>(text, params);
      return result.rows;
    } catch (error) {
      console.error(`[HOLDINGS] ${failureMessage}:`, error);
      throw new HoldingRepositoryError(failureMessage, error instanceof Error ? error : undefined);
    }
  }
}
