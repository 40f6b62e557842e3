import dotenv from 'dotenv';
import { Pool, PoolClient, PoolConfig, QueryConfig, QueryResult, QueryResultRow } from 'pg';

// Load environment variables
dotenv.config();

/**
 * Custom error class for database errors
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly detail?: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/**
 * PostgreSQL error code for unique constraint violations
 */
export const UNIQUE_VIOLATION = '23505';

/**
 * Minimal query surface shared by the pool and a transaction client
 */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

interface PgErrorFields {
  code?: string;
  detail?: string;
}

const pgErrorFields = (error: unknown): PgErrorFields => {
  if (typeof error !== 'object' || error === null) {
    return {};
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  const detail = 'detail' in error && typeof error.detail === 'string' ? error.detail : undefined;
  return { code, detail };
};

const buildPoolConfig = (): PoolConfig => {
  const config: PoolConfig = {
    user: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    database: process.env.DB_NAME || 'portfolio_prices_dev',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    max: process.env.NODE_ENV === 'test' ? 5 : 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    application_name: 'portfolio-price-aggregator',
    statement_timeout: 30000,
  };

  if (process.env.NODE_ENV === 'production') {
    config.ssl = { rejectUnauthorized: false };
  }

  return config;
};

/**
 * Database service class with singleton pattern
 */
export class DatabaseService implements Queryable {
  private static instance: DatabaseService | undefined;
  private pool: Pool;
  private isConnected: boolean = false;
  private lastHealthCheck: Date = new Date();
  private readonly healthCheckInterval: number = 30000; // 30 seconds

  private constructor(config: PoolConfig) {
    console.log(`[DATABASE] Connecting to ${config.host}:${config.port}/${config.database}`);

    this.pool = new Pool(config);

    this.pool.on('error', (err) => {
      console.error('[DATABASE] Unexpected error on idle client', err);
      this.isConnected = false;
    });
  }

  /**
   * Get the singleton instance of the database service
   */
  public static async getInstance(): Promise<DatabaseService> {
    if (!DatabaseService.instance) {
      const instance = new DatabaseService(buildPoolConfig());
      await instance.validateConnection();
      DatabaseService.instance = instance;
    }
    return DatabaseService.instance;
  }

  /**
   * Validate the database connection
   */
  private async validateConnection(): Promise<void> {
    try {
      const client = await this.pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
      this.isConnected = true;
      this.lastHealthCheck = new Date();
    } catch (error) {
      this.isConnected = false;
      throw new DatabaseError('Failed to connect to database', undefined, undefined, error);
    }
  }

  /**
   * Execute a SQL query with parameters. Slow statements are bounded by the
   * pool's `statement_timeout`.
   */
  public async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    if (!this.isConnected) {
      await this.validateConnection();
    }

    if (Date.now() - this.lastHealthCheck.getTime() > this.healthCheckInterval) {
      await this.healthCheck();
    }

    const queryConfig: QueryConfig = { text, values: params };

    try {
      const start = Date.now();
      const res = await this.pool.query<T>(queryConfig);
      const duration = Date.now() - start;

      if (process.env.NODE_ENV === 'development') {
        console.log('[DATABASE] Executed query', { text, duration, rows: res.rowCount });
      }

      return res;
    } catch (error) {
      const { code, detail } = pgErrorFields(error);
      throw new DatabaseError('Error executing query', code, detail, error);
    }
  }

  /**
   * Execute a transaction with the provided callback
   */
  public async transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T> {
    const client: PoolClient = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      const { code, detail } = pgErrorFields(error);
      throw new DatabaseError('Error executing transaction', code, detail, error);
    } finally {
      client.release();
    }
  }

  /**
   * Perform a health check on the database connection
   */
  public async healthCheck(): Promise<boolean> {
    try {
      await this.validateConnection();
      return true;
    } catch (error) {
      console.error('[DATABASE] Health check failed:', error);
      return false;
    }
  }

  /**
   * Close the connection pool
   */
  public async close(): Promise<void> {
    await this.pool.end();
    this.isConnected = false;
    DatabaseService.instance = undefined;
  }
}
