/**
 * @clinistock/core
 * Logger, error taxonomy, environment config, PostgreSQL helpers and
 * free-text parsing shared by every package
 */

// Logger
export {
  createLogger,
  generateCorrelationId,
  redactObject,
  logger,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

// Errors
export {
  AppError,
  ValidationError,
  NotFoundError,
  DatabaseConnectionError,
  DatabaseOperationError,
  isOperationalError,
  toSafeErrorResponse,
  toDatabaseError,
  type ErrorCode,
  type SafeErrorDetails,
} from './errors.js';

// Environment
export { EnvSchema, validateEnv, getReplenishmentDefaults, type Env } from './env.js';

// Database
export {
  createDatabaseClient,
  closeDatabasePool,
  withTransaction,
  withAdvisoryLock,
  stringToLockKey,
  SerializationError,
  DeadlockError,
  LockNotAvailableError,
  type DatabaseClient,
  type DatabasePool,
  type DatabaseConfig,
  type PoolClient,
  type QueryResult,
  type TransactionClient,
  type TransactionOptions,
} from './database.js';

// Batch insert
export {
  batchInsert,
  buildInsertQuery,
  type BatchInsertOptions,
  type ConflictClause,
} from './batch-insert.js';

// Parsing
export {
  parseQuantityText,
  parseQuantity,
  parseDate,
  toYearMonth,
  addDays,
  todayIso,
  type QuantityText,
  type ParsedQuantity,
} from './quantity.js';
