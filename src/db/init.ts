import { DatabaseService } from '../config/database';
import { HOLDING_TYPES } from '../types/common/enums';

const holdingTypeList = HOLDING_TYPES.map(type => `'${type}'`).join(', ');

export const CREATE_HOLDINGS_TABLE = `
  CREATE TABLE IF NOT EXISTS holdings (
    id SERIAL PRIMARY KEY,
    type VARCHAR(10) NOT NULL CHECK (type IN (${holdingTypeList})),
    symbol VARCHAR(20) NOT NULL,
    quantity NUMERIC(28, 10) NOT NULL DEFAULT 0 CHECK (quantity >= 0),
    cost_basis NUMERIC(28, 10) NOT NULL DEFAULT 0 CHECK (cost_basis >= 0),
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    UNIQUE (type, symbol)
  )
`;

export const CREATE_HOLDINGS_TYPE_INDEX =
  'CREATE INDEX IF NOT EXISTS idx_holdings_type ON holdings (type)';

/**
 * Tests the database connection
 */
const testDatabaseConnection = async (db: DatabaseService): Promise<boolean> => {
  const healthy = await db.healthCheck();
  if (healthy) {
    console.log('[DATABASE] Connection established successfully.');
  } else {
    console.error('[DATABASE] Error connecting to database.');
  }
  return healthy;
};

/**
 * Creates the holdings schema. With --force in development the table is dropped first.
 */
const initDb = async (): Promise<void> => {
  const db = await DatabaseService.getInstance();

  try {
    if (!(await testDatabaseConnection(db))) {
      throw new Error('Could not initialize database due to connection issues.');
    }

    const forceSync = process.env.NODE_ENV === 'development' && process.argv.includes('--force');
    if (forceSync) {
      console.warn('[DATABASE] WARNING: the holdings table will be dropped and recreated.');
    }

    await db.transaction(async client => {
      if (forceSync) {
        await client.query('DROP TABLE IF EXISTS holdings');
      }
      await client.query(CREATE_HOLDINGS_TABLE);
      await client.query(CREATE_HOLDINGS_TYPE_INDEX);
    });

    console.log(`[DATABASE] Schema initialized in ${forceSync ? 'force' : 'normal'} mode.`);
  } finally {
    await db.close();
  }
};

// Execute if this file is called directly
if (require.main === module) {
  initDb()
    .then(() => {
      console.log('Process completed.');
      process.exit(0);
    })
    .catch(error => {
      console.error('Error in initialization process:', error);
      process.exit(1);
    });
}

export { initDb };
