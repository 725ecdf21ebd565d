/**
 * Transactions, conflict retries and advisory locks against a mocked pool
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  type DatabasePool,
  type QueryResult,
  type PoolClient,
  SerializationError,
  DeadlockError,
  LockNotAvailableError,
  withTransaction,
  withAdvisoryLock,
  stringToLockKey,
  createDatabaseClient,
  closeDatabasePool,
} from '../database.js';
import { DatabaseConnectionError } from '../errors.js';

interface RecordedQuery {
  query: string;
  params?: unknown[];
}

function createMockClient(
  queryResults: QueryResult[],
  clientQueries: RecordedQuery[]
): PoolClient & { queries: RecordedQuery[] } {
  let queryIndex = 0;

  return {
    queries: clientQueries,
    query: vi.fn().mockImplementation(async (sql: string, params?: unknown[]) => {
      clientQueries.push(params !== undefined ? { query: sql, params } : { query: sql });
      return queryResults[queryIndex++ % queryResults.length] ?? { rows: [], rowCount: 0 };
    }),
    release: vi.fn(),
  };
}

/**
 * Mock database pool for testing
 */
function createMockPool(options: {
  queryResults?: QueryResult[];
  clientQueries?: RecordedQuery[];
}): DatabasePool & { mockClient: ReturnType<typeof createMockClient> } {
  const { queryResults = [{ rows: [], rowCount: 0 }], clientQueries = [] } = options;
  const mockClient = createMockClient(queryResults, clientQueries);

  return {
    mockClient,
    query: vi.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
    connect: vi.fn().mockResolvedValue(mockClient),
    end: vi.fn().mockResolvedValue(undefined),
  };
}

function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('withTransaction', () => {
  let mockPool: ReturnType<typeof createMockPool>;
  let clientQueries: RecordedQuery[];

  beforeEach(() => {
    clientQueries = [];
    mockPool = createMockPool({ clientQueries });
  });

  describe('Basic Transaction Flow', () => {
    it('should run BEGIN, the body and COMMIT in order on one connection', async () => {
      await withTransaction(mockPool, async (tx) => {
        await tx.query('DELETE FROM demanda_diaria');
      });

      expect(clientQueries.map((q) => q.query)).toEqual([
        'BEGIN ISOLATION LEVEL READ COMMITTED',
        'SET LOCAL statement_timeout = 30000',
        'DELETE FROM demanda_diaria',
        'COMMIT',
      ]);
      expect(mockPool.connect).toHaveBeenCalledTimes(1);
    });

    it('should return the result from the transaction function', async () => {
      const result = await withTransaction(mockPool, async () => ({ value: 42 }));

      expect(result).toEqual({ value: 42 });
    });

    it('should release the client after transaction', async () => {
      await withTransaction(mockPool, async () => 'done');

      expect(mockPool.mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('should apply the requested statement timeout', async () => {
      await withTransaction(mockPool, async () => 'done', { timeoutMs: 5000 });

      expect(clientQueries[1]?.query).toBe('SET LOCAL statement_timeout = 5000');
    });
  });

  describe('Error Handling', () => {
    it('should ROLLBACK and rethrow on error', async () => {
      await expect(
        withTransaction(mockPool, async () => {
          throw new Error('insert failed');
        })
      ).rejects.toThrow('insert failed');

      const queries = clientQueries.map((q) => q.query);
      expect(queries).toContain('ROLLBACK');
      expect(queries).not.toContain('COMMIT');
      expect(mockPool.mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('should surface the original error when ROLLBACK itself fails', async () => {
      vi.mocked(mockPool.mockClient.query).mockImplementation(async (sql: string) => {
        if (sql === 'ROLLBACK') throw new Error('connection lost');
        return { rows: [], rowCount: 0 };
      });

      await expect(
        withTransaction(mockPool, async () => {
          throw new Error('insert failed');
        })
      ).rejects.toThrow('insert failed');
    });

    it('should map lock_not_available to LockNotAvailableError', async () => {
      await expect(
        withTransaction(mockPool, async () => {
          throw pgError('55P03', 'could not obtain lock');
        })
      ).rejects.toThrow(LockNotAvailableError);
    });
  });

  describe('Retry Logic', () => {
    it('should retry on serialization failure (40001)', async () => {
      let attempts = 0;

      const result = await withTransaction(
        mockPool,
        async () => {
          attempts++;
          if (attempts < 2) throw pgError('40001', 'serialization failure');
          return attempts;
        },
        { maxRetries: 3, retryBaseDelayMs: 1 }
      );

      expect(result).toBe(2);
      expect(mockPool.connect).toHaveBeenCalledTimes(2);
    });

    it('should throw SerializationError after max retries', async () => {
      await expect(
        withTransaction(
          mockPool,
          async () => {
            throw pgError('40001', 'serialization failure');
          },
          { maxRetries: 2, retryBaseDelayMs: 1 }
        )
      ).rejects.toThrow(SerializationError);
      expect(mockPool.connect).toHaveBeenCalledTimes(2);
    });

    it('should throw DeadlockError after max retries', async () => {
      await expect(
        withTransaction(
          mockPool,
          async () => {
            throw pgError('40P01', 'deadlock detected');
          },
          { maxRetries: 2, retryBaseDelayMs: 1 }
        )
      ).rejects.toThrow(DeadlockError);
    });

    it('should keep the last conflict as the cause', async () => {
      const conflict = pgError('40001', 'could not serialize access');

      const failure = await withTransaction(
        mockPool,
        async () => {
          throw conflict;
        },
        { maxRetries: 1 }
      ).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(SerializationError);
      expect(failure).toMatchObject({
        message: 'Database transaction failed: could not serialize access (after 1 attempts)',
        cause: conflict,
        isRetryable: true,
      });
    });

    it('should not retry other database errors', async () => {
      await expect(
        withTransaction(mockPool, async () => {
          throw pgError('23505', 'duplicate key value');
        })
      ).rejects.toThrow('duplicate key value');
      expect(mockPool.connect).toHaveBeenCalledTimes(1);
    });
  });
});

describe('withAdvisoryLock', () => {
  let clientQueries: RecordedQuery[];

  beforeEach(() => {
    clientQueries = [];
  });

  it('should acquire and release advisory lock around the body', async () => {
    const mockPool = createMockPool({
      clientQueries,
      queryResults: [{ rows: [{ pg_advisory_lock: null }], rowCount: 1 }],
    });

    const result = await withAdvisoryLock(mockPool, 12345, async () => ({ value: 'test' }));

    expect(result).toEqual({ value: 'test' });
    expect(clientQueries).toEqual([
      { query: 'SELECT pg_advisory_lock($1)', params: [12345] },
      { query: 'SELECT pg_advisory_unlock($1)', params: [12345] },
    ]);
    expect(mockPool.mockClient.release).toHaveBeenCalledTimes(1);
  });

  it('should release lock on error', async () => {
    const mockPool = createMockPool({ clientQueries });

    await expect(
      withAdvisoryLock(mockPool, 12345, async () => {
        throw new Error('Function failed');
      })
    ).rejects.toThrow('Function failed');

    expect(clientQueries.map((q) => q.query)).toContain('SELECT pg_advisory_unlock($1)');
  });
});

describe('stringToLockKey', () => {
  it('should generate consistent hash for same string', () => {
    expect(stringToLockKey('clinistock:demand-rebuild')).toBe(
      stringToLockKey('clinistock:demand-rebuild')
    );
  });

  it('should generate different hashes for different strings', () => {
    expect(stringToLockKey('a')).not.toBe(stringToLockKey('b'));
  });

  it('should hash a single character to its char code', () => {
    expect(stringToLockKey('a')).toBe(97);
  });

  it('should return 0 for empty string', () => {
    expect(stringToLockKey('')).toBe(0);
  });
});

describe('createDatabaseClient', () => {
  it('should refuse to start without a connection string', async () => {
    await closeDatabasePool();
    vi.stubEnv('DATABASE_URL', '');

    expect(() => createDatabaseClient()).toThrow(DatabaseConnectionError);

    vi.unstubAllEnvs();
  });
});
