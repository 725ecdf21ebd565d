/**
 * PostgreSQL access shared by the repositories and the migration tool
 *
 * Repositories depend on the narrow `DatabasePool` interface so tests can
 * hand them a mocked pool, and production code the pg-backed one below.
 */

import { randomInt } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import pg from 'pg';
import { DatabaseConnectionError, DatabaseOperationError } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger({ name: 'database' });

export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number | null;
}

/**
 * Anything that runs a parameterized query: pg.Pool, pg.Client, a
 * transaction client
 */
export interface DatabaseClient {
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export interface PoolClient extends DatabaseClient {
  release(): void;
}

export interface DatabasePool extends DatabaseClient {
  connect(): Promise<PoolClient>;
  end(): Promise<void>;
}

export interface DatabaseConfig {
  connectionString: string;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
  ssl?: boolean;
}

function toQueryResult<T>(result: { rows: T[]; rowCount: number | null }): QueryResult<T> {
  return { rows: result.rows, rowCount: result.rowCount };
}

/**
 * Opens the pg pool on first use and checks one connection before handing
 * it out
 */
class LazyPostgresPool implements DatabasePool {
  private opening: Promise<pg.Pool> | null = null;

  constructor(private readonly config: DatabaseConfig) {}

  private pool(): Promise<pg.Pool> {
    this.opening ??= this.open().catch((error: unknown) => {
      this.opening = null;
      throw error;
    });
    return this.opening;
  }

  private async open(): Promise<pg.Pool> {
    const pool = new pg.Pool({
      connectionString: this.config.connectionString,
      max: this.config.maxConnections ?? 10,
      idleTimeoutMillis: this.config.idleTimeoutMs ?? 30_000,
      connectionTimeoutMillis: this.config.connectionTimeoutMs ?? 5_000,
      ssl: this.config.ssl ? { rejectUnauthorized: true } : undefined,
    });

    try {
      (await pool.connect()).release();
    } catch (error) {
      logger.error({ err: error }, 'Could not reach the database');
      await pool.end();
      throw new DatabaseConnectionError(
        error instanceof Error ? error.message : 'Database connection failed'
      );
    }

    logger.info({ ssl: Boolean(this.config.ssl) }, 'Database pool opened');
    return pool;
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    const pool = await this.pool();
    return toQueryResult<T>(await pool.query<T & pg.QueryResultRow>(sql, params));
  }

  async connect(): Promise<PoolClient> {
    const client = await (await this.pool()).connect();
    return {
      query: async <T = Record<string, unknown>>(sql: string, params?: unknown[]) =>
        toQueryResult<T>(await client.query<T & pg.QueryResultRow>(sql, params)),
      release: () => client.release(),
    };
  }

  async end(): Promise<void> {
    if (!this.opening) return;
    const pool = await this.opening;
    this.opening = null;
    await pool.end();
    logger.info('Database pool closed');
  }
}

let sharedPool: DatabasePool | null = null;

/**
 * The process-wide pool; the connection string falls back to DATABASE_URL
 *
 * @example
 * ```typescript
 * const db = createDatabaseClient();
 * const { rows } = await db.query('SELECT * FROM produto WHERE codigo = $1', [code]);
 * ```
 */
export function createDatabaseClient(config: Partial<DatabaseConfig> = {}): DatabasePool {
  const connectionString = config.connectionString ?? process.env.DATABASE_URL;
  if (!connectionString) {
    throw new DatabaseConnectionError('DATABASE_URL is not configured');
  }

  sharedPool ??= new LazyPostgresPool({ ...config, connectionString });
  return sharedPool;
}

/**
 * Close the process-wide pool during shutdown
 */
export async function closeDatabasePool(): Promise<void> {
  const pool = sharedPool;
  sharedPool = null;
  await pool?.end();
}

// =============================================================================
// TRANSACTIONS
// =============================================================================

export interface TransactionOptions {
  /** Statement timeout in milliseconds (default 30000) */
  timeoutMs?: number;
  /** Attempts before a conflict is reported (default 3) */
  maxRetries?: number;
  /** Base of the exponential backoff in milliseconds (default 100) */
  retryBaseDelayMs?: number;
}

/**
 * Client handed to a transaction body; every query runs on one connection
 */
export type TransactionClient = DatabaseClient;

/**
 * Concurrent transactions could not be serialized (SQLSTATE 40001)
 */
export class SerializationError extends DatabaseOperationError {
  public readonly isRetryable = true;
}

/**
 * SQLSTATE 40P01
 */
export class DeadlockError extends DatabaseOperationError {
  public readonly isRetryable = true;
}

/**
 * A row or table lock was not granted in time (SQLSTATE 55P03)
 */
export class LockNotAvailableError extends DatabaseOperationError {
  public readonly isRetryable = false;
}

type ConflictErrorClass = new (
  operation: string,
  reason: string,
  cause?: Error
) => DatabaseOperationError;

const RETRYABLE: Readonly<Record<'40001' | '40P01', ConflictErrorClass>> = {
  '40001': SerializationError,
  '40P01': DeadlockError,
};

const LOCK_NOT_AVAILABLE = '55P03';

function sqlState(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

function isRetryableState(state: string | undefined): state is keyof typeof RETRYABLE {
  return state !== undefined && state in RETRYABLE;
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Exponential delay with jitter between half and the full step
 */
function backoffDelay(baseMs: number, attempt: number): number {
  const jitter = 0.5 + randomInt(0, 1_000_000) / 2_000_000;
  return baseMs * 2 ** attempt * jitter;
}

async function runInTransaction<T>(
  client: PoolClient,
  fn: (client: TransactionClient) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  try {
    await client.query('BEGIN ISOLATION LEVEL READ COMMITTED');
    await client.query(`SET LOCAL statement_timeout = ${Math.trunc(timeoutMs)}`);
    const result = await fn({ query: client.query.bind(client) });
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logger.error({ err: rollbackError }, 'Transaction rollback failed');
    });
    throw error;
  }
}

/**
 * Run `fn` inside BEGIN/COMMIT on one pooled connection
 *
 * Rolls back on any error. Serialization failures and deadlocks are retried
 * with backoff, then reported as SerializationError or DeadlockError.
 *
 * @example
 * ```typescript
 * await withTransaction(db, async (tx) => {
 *   await tx.query('DELETE FROM demanda_diaria');
 *   await tx.query('INSERT INTO demanda_diaria ...', values);
 * });
 * ```
 */
export async function withTransaction<T>(
  pool: DatabasePool,
  fn: (client: TransactionClient) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const {
    timeoutMs = 30_000,
    maxRetries = 3,
    retryBaseDelayMs = 100,
  } = options;

  for (let attempt = 1; ; attempt++) {
    const client = await pool.connect();
    let state: string | undefined;
    try {
      return await runInTransaction(client, fn, timeoutMs);
    } catch (error) {
      state = sqlState(error);

      if (state === LOCK_NOT_AVAILABLE) {
        throw new LockNotAvailableError('transaction', reasonOf(error), toCause(error));
      }
      if (!isRetryableState(state)) throw error;

      if (attempt >= maxRetries) {
        const ConflictError = RETRYABLE[state];
        throw new ConflictError(
          'transaction',
          `${reasonOf(error)} (after ${attempt} attempts)`,
          toCause(error)
        );
      }
    } finally {
      client.release();
    }

    const delay = backoffDelay(retryBaseDelayMs, attempt);
    logger.warn({ attempt, maxRetries, delay, sqlState: state }, 'Transaction conflict, retrying');
    await sleep(delay);
  }
}

function toCause(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

// =============================================================================
// ADVISORY LOCKS
// =============================================================================

/**
 * Hold a session-level advisory lock while `fn` runs, waiting for it if
 * another session has it
 */
export async function withAdvisoryLock<T>(
  pool: DatabasePool,
  lockKey: number,
  fn: () => Promise<T>
): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('SELECT pg_advisory_lock($1)', [lockKey]);
    logger.debug({ lockKey }, 'Advisory lock acquired');

    try {
      return await fn();
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [lockKey]);
      logger.debug({ lockKey }, 'Advisory lock released');
    }
  } finally {
    client.release();
  }
}

/**
 * Stable non-negative 32-bit key for a lock name
 */
export function stringToLockKey(name: string): number {
  let hash = 0;
  for (const char of name) {
    hash = (Math.imul(hash, 31) + (char.codePointAt(0) ?? 0)) | 0;
  }
  return Math.abs(hash);
}
