import { HoldingRepository, toHolding } from '../holding-repository';
import { DatabaseError, DatabaseService, UNIQUE_VIOLATION } from '../../config/database';
import { HoldingType } from '../../types/common/enums';
import { HoldingRow } from '../../types/models/holding';
import {
  HoldingExistsError,
  HoldingNotFoundError,
  HoldingRepositoryError,
} from '../../utils/errors/repository-error';

describe('HoldingRepository', () => {
  let dbService: jest.Mocked<DatabaseService>;
  let repo: HoldingRepository;

  const createdAt = new Date('2024-06-01T09:00:00Z');

  const row = (overrides: Partial<HoldingRow> = {}): HoldingRow => ({
    id: 1,
    type: HoldingType.FUND,
    symbol: 'KUT',
    quantity: '100.0000000000',
    cost_basis: '1200.0000000000',
    created_at: createdAt,
    updated_at: createdAt,
    ...overrides,
  });

  const mockQueryResult = <T>(rows: T[], rowCount: number | null = rows.length): any => ({
    rows,
    command: '',
    rowCount,
    oid: 0,
    fields: [],
  });

  beforeEach(() => {
    dbService = {
      query: jest.fn(),
      transaction: jest.fn(),
    } as any;
    repo = new HoldingRepository(dbService);

    // Mock console methods to avoid cluttering test output
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('toHolding', () => {
    it('should convert NUMERIC strings to numbers', () => {
      expect(toHolding(row())).toEqual({
        id: 1,
        type: HoldingType.FUND,
        symbol: 'KUT',
        quantity: 100,
        costBasis: 1200,
        createdAt,
        updatedAt: createdAt,
      });
    });
  });

  describe('findByType', () => {
    it('should filter by type ordered by symbol', async () => {
      dbService.query.mockResolvedValue(
        mockQueryResult([row(), row({ id: 2, symbol: 'TI2', quantity: '250', cost_basis: '900' })]),
      );

      const holdings = await repo.findByType(HoldingType.FUND);

      expect(holdings.map(holding => [holding.symbol, holding.quantity])).toEqual([
        ['KUT', 100],
        ['TI2', 250],
      ]);
      expect(dbService.query).toHaveBeenCalledWith(
        'SELECT id, type, symbol, quantity, cost_basis, created_at, updated_at FROM holdings WHERE type = $1 ORDER BY symbol',
        [HoldingType.FUND],
      );
    });

    it('should wrap database failures', async () => {
      dbService.query.mockRejectedValue(new DatabaseError('Error executing query'));

      await expect(repo.findByType(HoldingType.CRYPTO)).rejects.toThrow(HoldingRepositoryError);
      await expect(repo.findByType(HoldingType.CRYPTO)).rejects.toThrow('Failed to list crypto holdings');
    });
  });

  describe('findById', () => {
    it('should return null when no row matches', async () => {
      dbService.query.mockResolvedValue(mockQueryResult([]));

      await expect(repo.findById(42)).resolves.toBeNull();
    });
  });

  describe('findBySymbol', () => {
    it('should look up by type and symbol', async () => {
      dbService.query.mockResolvedValue(
        mockQueryResult([row({ id: 3, type: HoldingType.CRYPTO, symbol: 'BTCUSDT', quantity: '0.05' })]),
      );

      const holding = await repo.findBySymbol(HoldingType.CRYPTO, 'BTCUSDT');

      expect(holding?.quantity).toBe(0.05);
      expect(dbService.query).toHaveBeenCalledWith(expect.stringContaining('WHERE type = $1 AND symbol = $2'), [
        HoldingType.CRYPTO,
        'BTCUSDT',
      ]);
    });
  });

  describe('create', () => {
    const input = { type: HoldingType.FUND, symbol: 'KUT', quantity: 100, costBasis: 1200 };

    it('should insert and return the new holding', async () => {
      dbService.query.mockResolvedValue(mockQueryResult([row()]));

      const holding = await repo.create(input);

      expect(holding.id).toBe(1);
      expect(holding.costBasis).toBe(1200);
      expect(dbService.query).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO holdings'), [
        HoldingType.FUND,
        'KUT',
        100,
        1200,
      ]);
    });

    it('should report a duplicate (type, symbol) as HoldingExistsError', async () => {
      dbService.query.mockRejectedValue(new DatabaseError('Error executing query', UNIQUE_VIOLATION));

      const error = await repo.create(input).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HoldingExistsError);
      expect(error).toMatchObject({ statusCode: 409, message: 'Holding already exists for fund KUT' });
    });

    it('should wrap other database failures', async () => {
      dbService.query.mockRejectedValue(new DatabaseError('Error executing query', '23514'));

      await expect(repo.create(input)).rejects.toThrow(HoldingRepositoryError);
    });
  });

  describe('update', () => {
    it('should pass null for fields that are not being changed', async () => {
      dbService.query.mockResolvedValue(mockQueryResult([row({ quantity: '150' })]));

      const holding = await repo.update(1, { quantity: 150 });

      expect(holding.quantity).toBe(150);
      expect(dbService.query).toHaveBeenCalledWith(expect.stringContaining('COALESCE($2, quantity)'), [1, 150, null]);
    });

    it('should throw HoldingNotFoundError when no row is updated', async () => {
      dbService.query.mockResolvedValue(mockQueryResult([]));

      await expect(repo.update(99, { costBasis: 10 })).rejects.toThrow(HoldingNotFoundError);
    });
  });

  describe('delete', () => {
    it('should delete by id', async () => {
      dbService.query.mockResolvedValue(mockQueryResult([], 1));

      await expect(repo.delete(1)).resolves.toBeUndefined();
      expect(dbService.query).toHaveBeenCalledWith('DELETE FROM holdings WHERE id = $1', [1]);
    });

    it('should throw HoldingNotFoundError when nothing was deleted', async () => {
      dbService.query.mockResolvedValue(mockQueryResult([], 0));

      await expect(repo.delete(7)).rejects.toThrow('Holding 7 not found');
    });
  });

  describe('bulkCreate', () => {
    it('should count only the rows actually inserted', async () => {
      const client = {
        query: jest
          .fn()
          .mockResolvedValueOnce(mockQueryResult([], 1))
          .mockResolvedValueOnce(mockQueryResult([], 0)),
      };
      dbService.transaction.mockImplementation(async callback => callback(client));

      const inserted = await repo.bulkCreate([
        { type: HoldingType.FUND, symbol: 'KUT', quantity: 100, costBasis: 1200 },
        { type: HoldingType.FUND, symbol: 'KUT', quantity: 1, costBasis: 1 },
      ]);

      expect(inserted).toBe(1);
      expect(client.query).toHaveBeenCalledTimes(2);
      expect(client.query).toHaveBeenCalledWith(expect.stringContaining('ON CONFLICT (type, symbol) DO NOTHING'), [
        HoldingType.FUND,
        'KUT',
        100,
        1200,
      ]);
    });

    it('should not open a transaction for an empty list', async () => {
      await expect(repo.bulkCreate([])).resolves.toBe(0);
      expect(dbService.transaction).not.toHaveBeenCalled();
    });
  });

  describe('isEmpty', () => {
    it.each([
      ['0', true],
      ['3', false],
    ])('should read a count of %s as %s', async (count, expected) => {
      dbService.query.mockResolvedValue(mockQueryResult([{ count }]));

      await expect(repo.isEmpty()).resolves.toBe(expected);
    });
  });
});
