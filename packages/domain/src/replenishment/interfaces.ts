/**
 * @fileoverview Replenishment Ports and Configuration
 *
 * Repository interfaces the replenishment services depend on, plus the
 * service configuration and dependency bundles. Adapters live in
 * `@clinistock/infrastructure`.
 *
 * @module domain/replenishment/interfaces
 */

import type {
  ConsumptionDimension,
  Option,
  DailyDemand,
  EntryRecord,
  ExitRecord,
  LotSnapshot,
  MonthlyDemand,
  Product,
  ReplenishmentParameters,
} from '@clinistock/types';
import type { ParsedQuantity } from '@clinistock/core';

// ============================================================================
// REPOSITORY PORTS
// ============================================================================

/**
 * Product catalog and consumption dimensions
 */
export interface ICatalogRepository {
  /**
   * All products, ordered by code
   */
  getProducts(): Promise<Product[]>;

  getProduct(code: string): Promise<Product | null>;

  /**
   * All consumption dimensions (at most one per product code)
   */
  getDimensions(): Promise<ConsumptionDimension[]>;

  /**
   * Insert or update products by code; returns the number written
   */
  upsertProducts(products: readonly Product[]): Promise<number>;

  upsertDimensions(dimensions: readonly ConsumptionDimension[]): Promise<number>;
}

/**
 * Append-only transaction logs and the per-lot stock snapshot
 */
export interface IStockLedgerRepository {
  insertEntry(entry: EntryRecord): Promise<void>;

  insertExit(exit: ExitRecord): Promise<void>;

  /**
   * Every recorded exit, discarded ones included
   */
  getExits(): Promise<ExitRecord[]>;

  getLots(): Promise<LotSnapshot[]>;

  /**
   * Insert or update lots keyed by (code, lot)
   */
  upsertLots(lots: readonly LotSnapshot[]): Promise<number>;

  /**
   * Clear the snapshot and load `lots` in its place, atomically
   */
  replaceLots(lots: readonly LotSnapshot[]): Promise<number>;
}

/**
 * Derived demand aggregates
 */
export interface IDemandRepository {
  /**
   * Replace both series wholesale. Readers never observe an empty
   * intermediate state and concurrent rebuilds are serialized.
   */
  replaceDemand(daily: readonly DailyDemand[], monthly: readonly MonthlyDemand[]): Promise<void>;

  getDailyDemand(): Promise<DailyDemand[]>;

  getMonthlyDemand(): Promise<MonthlyDemand[]>;
}

/**
 * String-encoded global parameters, keyed by their stored names
 */
export interface IParameterStore {
  getRawParameters(): Promise<Record<string, string>>;

  setRawParameters(values: Record<string, string>): Promise<void>;
}

// ============================================================================
// PARSERS
// ============================================================================

/**
 * Free-text parsing used when rebuilding demand
 */
export interface RecordParsers {
  parseQuantity(text: string): Option<ParsedQuantity>;
  parseDate(text: string): Option<string>;
}

// ============================================================================
// SERVICE CONFIGURATION
// ============================================================================

export interface ReplenishmentServiceConfig {
  /** Used for any parameter key missing from the store */
  readonly defaults: ReplenishmentParameters;
}

/**
 * Default configuration values
 */
export const DEFAULT_REPLENISHMENT_CONFIG: ReplenishmentServiceConfig = {
  defaults: {
    serviceLevel: 0.95,
    leadTimeMeanDays: 6,
    leadTimeStdDevDays: 1,
  },
} as const;

export interface ReportConfig {
  readonly ruptureHorizonDays: number;
  readonly expiryWindowDays: number;
  readonly topConsumptionLimit: number;
}

export const DEFAULT_REPORT_CONFIG: ReportConfig = {
  ruptureHorizonDays: 7,
  expiryWindowDays: 60,
  topConsumptionLimit: 20,
} as const;

// ============================================================================
// SERVICE DEPENDENCIES
// ============================================================================

export interface ReplenishmentServiceDeps {
  readonly catalog: ICatalogRepository;
  readonly ledger: IStockLedgerRepository;
  readonly demand: IDemandRepository;
  readonly parameters: IParameterStore;
  /** Defaults to the core quantity and date parsers */
  readonly parsers?: RecordParsers;
}

export interface StockLedgerServiceDeps {
  readonly catalog: ICatalogRepository;
  readonly ledger: IStockLedgerRepository;
}

export interface CatalogServiceDeps {
  readonly catalog: ICatalogRepository;
  readonly parameters: IParameterStore;
}
