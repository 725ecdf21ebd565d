/**
 * @fileoverview Replenishment Module
 *
 * Continuous-review replenishment for clinical stock: demand
 * reconstruction with unit conversion, demand statistics, safety stock and
 * reorder point under a service level, lot-size rounding, urgency
 * classification, and the reports built on top of them.
 *
 * @module domain/replenishment
 *
 * @example
 * ```typescript
 * import { createReplenishmentService, createReplenishmentReportService } from '@clinistock/domain';
 *
 * const replenishment = createReplenishmentService({ catalog, ledger, demand, parameters });
 * const reports = createReplenishmentReportService({ replenishment, catalog, ledger, demand });
 *
 * const alerts = await reports.ruptureAlert(7);
 * ```
 */

// Ports and configuration
export type {
  ICatalogRepository,
  IStockLedgerRepository,
  IDemandRepository,
  IParameterStore,
  RecordParsers,
  ReplenishmentServiceConfig,
  ReplenishmentServiceDeps,
  StockLedgerServiceDeps,
  CatalogServiceDeps,
  ReportConfig,
} from './interfaces.js';
export { DEFAULT_REPLENISHMENT_CONFIG, DEFAULT_REPORT_CONFIG } from './interfaces.js';

// Pure components
export {
  convert,
  normalizeUnit,
  targetUnitOf,
  unitConversionOf,
  type UnitConversion,
} from './unit-converter.js';
export { consolidateLots, emptyStock } from './lot-consolidator.js';
export {
  rebuildDemandSeries,
  aggregateMonthly,
  indexDimensions,
  DEFAULT_PARSERS,
  type DemandRebuildResult,
  type SkipReason,
} from './demand-rebuilder.js';
export {
  estimateDemandStatistics,
  indexStatistics,
  statisticsKey,
  mean,
  populationStdDev,
} from './demand-statistics.js';
export {
  inverseNormalCdf,
  zScore,
  leadTimeDemandMean,
  leadTimeDemandStdDev,
  safetyStock,
  reorderPoint,
  shortfall,
  coverageDays,
} from './formulas.js';
export {
  roundUpToMultiple,
  applyLotPolicy,
  classifyStatus,
  compareByUrgency,
  STATUS_PRIORITY,
} from './policies.js';
export {
  calculateReplenishment,
  missingDimensionRow,
  missingStatisticsRow,
  targetStockOf,
  type ReplenishmentInput,
} from './replenishment-calculator.js';
export { resolveParameters, validateParameters, encodeParameters } from './parameters.js';
export { parseInput } from './validation.js';

// Services
export { ReplenishmentService, createReplenishmentService } from './replenishment-service.js';
export {
  ReplenishmentReportService,
  createReplenishmentReportService,
  type ReportServiceDeps,
  type ExpiryOptions,
} from './report-service.js';
export {
  StockLedgerService,
  createStockLedgerService,
  toLotSnapshot,
  type RegisterLotsOptions,
} from './stock-ledger-service.js';
export { CatalogService, createCatalogService } from './catalog-service.js';
