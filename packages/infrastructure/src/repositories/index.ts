/**
 * @fileoverview Repository Adapters (Infrastructure Layer)
 *
 * PostgreSQL and in-memory adapters implementing the replenishment ports.
 *
 * ## Hexagonal Architecture
 *
 * Repositories here are **ADAPTERS** implementing domain **PORTS**:
 * - PostgresCatalogRepository implements ICatalogRepository
 * - PostgresStockLedgerRepository implements IStockLedgerRepository
 * - PostgresDemandRepository implements IDemandRepository
 * - PostgresParameterStore implements IParameterStore
 * - InMemoryReplenishmentRepository implements all four
 *
 * @module @clinistock/infrastructure/repositories
 */

import type { DatabasePool } from '@clinistock/core';
import { PostgresCatalogRepository } from './PostgresCatalogRepository.js';
import { PostgresDemandRepository } from './PostgresDemandRepository.js';
import { PostgresParameterStore } from './PostgresParameterStore.js';
import { PostgresStockLedgerRepository } from './PostgresStockLedgerRepository.js';

export {
  PostgresCatalogRepository,
  createPostgresCatalogRepository,
} from './PostgresCatalogRepository.js';
export {
  PostgresStockLedgerRepository,
  createPostgresStockLedgerRepository,
} from './PostgresStockLedgerRepository.js';
export {
  PostgresDemandRepository,
  createPostgresDemandRepository,
  DEMAND_REBUILD_LOCK,
} from './PostgresDemandRepository.js';
export { PostgresParameterStore, createPostgresParameterStore } from './PostgresParameterStore.js';
export {
  InMemoryReplenishmentRepository,
  createInMemoryReplenishmentRepository,
  type InMemoryReplenishmentSeed,
} from './InMemoryReplenishmentRepository.js';
export { fromConsumptionTypeCode, toConsumptionTypeCode } from './postgres-mappers.js';

/**
 * The four PostgreSQL adapters over one pool
 */
export interface PostgresReplenishmentRepositories {
  readonly catalog: PostgresCatalogRepository;
  readonly ledger: PostgresStockLedgerRepository;
  readonly demand: PostgresDemandRepository;
  readonly parameters: PostgresParameterStore;
}

export function createPostgresReplenishmentRepositories(
  pool: DatabasePool
): PostgresReplenishmentRepositories {
  return {
    catalog: new PostgresCatalogRepository(pool),
    ledger: new PostgresStockLedgerRepository(pool),
    demand: new PostgresDemandRepository(pool),
    parameters: new PostgresParameterStore(pool),
  };
}
