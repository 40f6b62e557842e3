import { readFile } from 'fs/promises';
import path from 'path';
import { DatabaseService } from '../config/database';
import { HoldingRepository } from '../repositories/holding-repository';
import { HoldingType } from '../types/common/enums';
import { CreateHoldingInput } from '../types/models/holding';
import { HoldingsSeed, holdingsSeedSchema } from '../types/schemas/handlers';

export const DEFAULT_SEED_FILE = 'config/holdings.json';

export const toHoldingInputs = (seed: HoldingsSeed): CreateHoldingInput[] => [
  ...seed.funds.map(fund => ({
    type: HoldingType.FUND,
    symbol: fund.code,
    quantity: fund.quantity,
    costBasis: fund.cost_basis,
  })),
  ...seed.crypto.map(coin => ({
    type: HoldingType.CRYPTO,
    symbol: coin.symbol,
    quantity: coin.quantity,
    costBasis: coin.cost_basis,
  })),
];

/**
 * Reads and validates a holdings seed file
 * @throws ZodError when the file does not match the seed schema
 */
export const loadSeedFile = async (filePath: string): Promise<CreateHoldingInput[]> => {
  const content = await readFile(filePath, 'utf8');
  return toHoldingInputs(holdingsSeedSchema.parse(JSON.parse(content)));
};

/**
 * Loads holdings from the seed file into an empty store. A store that already
 * has holdings is left untouched.
 * @returns Number of holdings inserted
 */
export const seedHoldings = async (
  repository: Pick<HoldingRepository, 'isEmpty' | 'bulkCreate'>,
  holdings: readonly CreateHoldingInput[],
): Promise<number> => {
  if (!(await repository.isEmpty())) {
    console.log('[SEED] Holdings already exist in database, skipping seed');
    return 0;
  }

  if (holdings.length === 0) {
    console.log('[SEED] No holdings in seed file');
    return 0;
  }

  const inserted = await repository.bulkCreate(holdings);
  console.log(`[SEED] Seeded ${inserted} holdings`);
  return inserted;
};

const seedDatabase = async (): Promise<void> => {
  const filePath = path.resolve(process.env.HOLDINGS_SEED_FILE || DEFAULT_SEED_FILE);
  console.log(`[SEED] Loading holdings from ${filePath}`);

  const holdings = await loadSeedFile(filePath);
  const db = await DatabaseService.getInstance();
  try {
    await seedHoldings(new HoldingRepository(db), holdings);
  } finally {
    await db.close();
  }
};

// Execute if this file is called directly
if (require.main === module) {
  seedDatabase()
    .then(() => {
      console.log('Process completed.');
      process.exit(0);
    })
    .catch(error => {
      console.error('Error seeding database:', error);
      process.exit(1);
    });
}

export { seedDatabase };
