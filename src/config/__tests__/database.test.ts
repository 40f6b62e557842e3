import { DatabaseError, DatabaseService, UNIQUE_VIOLATION } from '../database';

const mockClient = { query: jest.fn(), release: jest.fn() };
const mockPool = { query: jest.fn(), connect: jest.fn(), on: jest.fn(), end: jest.fn() };

jest.mock('pg', () => ({
  Pool: jest.fn(() => mockPool),
}));

describe('DatabaseService', () => {
  beforeEach(() => {
    mockPool.connect.mockResolvedValue(mockClient);
    mockPool.end.mockResolvedValue(undefined);
    mockClient.query.mockResolvedValue({ rows: [], rowCount: 1 });

    // Mock console methods to avoid cluttering test output
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    const db = await DatabaseService.getInstance();
    await db.close();
    jest.restoreAllMocks();
  });

  it('should validate the connection once when the instance is created', async () => {
    const first = await DatabaseService.getInstance();
    const second = await DatabaseService.getInstance();

    expect(second).toBe(first);
    expect(mockClient.query).toHaveBeenCalledWith('SELECT 1');
    expect(mockClient.release).toHaveBeenCalledTimes(1);
  });

  it('should send the text and values as one query config', async () => {
    const result = { rows: [{ count: '2' }], rowCount: 1 };
    mockPool.query.mockResolvedValueOnce(result);
    const db = await DatabaseService.getInstance();

    await expect(db.query('SELECT COUNT(*) AS count FROM holdings WHERE type = $1', ['fund'])).resolves.toBe(result);
    expect(mockPool.query).toHaveBeenCalledWith({
      text: 'SELECT COUNT(*) AS count FROM holdings WHERE type = $1',
      values: ['fund'],
    });
  });

  it('should wrap a failed query in a DatabaseError carrying the pg code', async () => {
    mockPool.query.mockRejectedValueOnce(Object.assign(new Error('duplicate key'), { code: UNIQUE_VIOLATION }));
    const db = await DatabaseService.getInstance();

    const error = await db.query('INSERT INTO holdings DEFAULT VALUES').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DatabaseError);
    expect(error).toMatchObject({ message: 'Error executing query', code: UNIQUE_VIOLATION });
  });

  it('should roll back and release the client when a transaction fails', async () => {
    const db = await DatabaseService.getInstance();
    mockClient.query.mockClear();
    mockClient.release.mockClear();

    await expect(
      db.transaction(async () => {
        throw new Error('insert failed');
      }),
    ).rejects.toThrow('Error executing transaction');

    expect(mockClient.query.mock.calls.map(([sql]) => sql)).toEqual(['BEGIN', 'ROLLBACK']);
    expect(mockClient.release).toHaveBeenCalledTimes(1);
  });
});
