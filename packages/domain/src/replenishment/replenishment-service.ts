/**
 * @fileoverview Replenishment Service
 *
 * Verification orchestrator and the core entry points: rebuild demand,
 * consolidate stock, estimate demand statistics, and run the full
 * per-product verification sorted by urgency.
 *
 * A verification run is one sequential batch. It always yields exactly one
 * row per non-excluded product; data-quality gaps surface as VERIFY rows.
 *
 * @module domain/replenishment/replenishment-service
 */

import { createLogger } from '@clinistock/core';
import type {
  ConsolidatedStock,
  DemandStatistics,
  ReplenishmentParameters,
  ReplenishmentRow,
} from '@clinistock/types';
import {
  DEFAULT_PARSERS,
  indexDimensions,
  rebuildDemandSeries,
  type DemandRebuildResult,
} from './demand-rebuilder.js';
import { estimateDemandStatistics, indexStatistics, statisticsKey } from './demand-statistics.js';
import type {
  ICatalogRepository,
  IDemandRepository,
  IParameterStore,
  IStockLedgerRepository,
  RecordParsers,
  ReplenishmentServiceConfig,
  ReplenishmentServiceDeps,
} from './interfaces.js';
import { DEFAULT_REPLENISHMENT_CONFIG } from './interfaces.js';
import { consolidateLots, emptyStock } from './lot-consolidator.js';
import { resolveParameters } from './parameters.js';
import { compareByUrgency } from './policies.js';
import {
  calculateReplenishment,
  missingDimensionRow,
  missingStatisticsRow,
} from './replenishment-calculator.js';
import { targetUnitOf } from './unit-converter.js';

const logger = createLogger({ name: 'replenishment-service' });

/**
 * Replenishment Service
 *
 * @example
 * ```typescript
 * const service = createReplenishmentService({ catalog, ledger, demand, parameters });
 *
 * const report = await service.runVerification();
 * const urgent = report.filter((row) => row.status === 'CRITICAL');
 * ```
 */
export class ReplenishmentService {
  private readonly config: ReplenishmentServiceConfig;
  private readonly catalog: ICatalogRepository;
  private readonly ledger: IStockLedgerRepository;
  private readonly demand: IDemandRepository;
  private readonly parameterStore: IParameterStore;
  private readonly parsers: RecordParsers;

  constructor(deps: ReplenishmentServiceDeps, config?: Partial<ReplenishmentServiceConfig>) {
    this.config = { ...DEFAULT_REPLENISHMENT_CONFIG, ...config };
    this.catalog = deps.catalog;
    this.ledger = deps.ledger;
    this.demand = deps.demand;
    this.parameterStore = deps.parameters;
    this.parsers = deps.parsers ?? DEFAULT_PARSERS;
  }

  // ==========================================================================
  // PARAMETERS
  // ==========================================================================

  /**
   * Stored parameters over the configured defaults
   *
   * @throws ValidationError on malformed or out-of-range values
   */
  async getParameters(): Promise<ReplenishmentParameters> {
    const stored = await this.parameterStore.getRawParameters();
    return resolveParameters(stored, this.config.defaults);
  }

  // ==========================================================================
  // CORE ENTRY POINTS
  // ==========================================================================

  /**
   * Regenerate daily and monthly demand from the full exit log and
   * replace the stored series with the result
   */
  async rebuildDemand(): Promise<DemandRebuildResult> {
    const [dimensions, exits] = await Promise.all([
      this.catalog.getDimensions(),
      this.ledger.getExits(),
    ]);

    const result = rebuildDemandSeries(exits, indexDimensions(dimensions), this.parsers);
    await this.demand.replaceDemand(result.daily, result.monthly);

    logger.info(
      {
        exits: exits.length,
        accepted: result.accepted,
        skipped: result.skipped,
        dailyBuckets: result.daily.length,
        monthlyBuckets: result.monthly.length,
      },
      'Demand rebuilt'
    );

    return result;
  }

  /**
   * Stock per product in both scales; catalog products without lots are zero
   */
  async consolidatedStock(): Promise<ConsolidatedStock[]> {
    const [lots, products] = await Promise.all([this.ledger.getLots(), this.catalog.getProducts()]);
    const codes = products.map((product) => product.code);
    return [...consolidateLots(lots, codes).values()];
  }

  /**
   * Statistics over the stored daily demand series
   */
  async demandStatistics(): Promise<DemandStatistics[]> {
    return estimateDemandStatistics(await this.demand.getDailyDemand());
  }

  /**
   * Rebuild demand, then compute and classify every product
   *
   * @returns Rows ordered CRITICAL, REPLENISH, OK, VERIFY, then by coverage
   * @throws ValidationError when stored parameters are invalid
   */
  async runVerification(): Promise<ReplenishmentRow[]> {
    const parameters = await this.getParameters();

    const rebuild = await this.rebuildDemand();
    const statistics = indexStatistics(estimateDemandStatistics(rebuild.daily));

    const [products, dimensions, lots] = await Promise.all([
      this.catalog.getProducts(),
      this.catalog.getDimensions(),
      this.ledger.getLots(),
    ]);
    const dimensionsByCode = indexDimensions(dimensions);
    const stockByCode = consolidateLots(
      lots,
      products.map((product) => product.code)
    );

    const rows: ReplenishmentRow[] = [];

    for (const product of products) {
      const dimension = dimensionsByCode.get(product.code);
      if (!dimension) {
        logger.debug({ code: product.code }, 'Product has no consumption dimension');
        rows.push(missingDimensionRow(product));
        continue;
      }

      if (dimension.consumptionType === 'excluded') continue;

      const stock = stockByCode.get(product.code) ?? emptyStock(product.code);
      const targetUnit = targetUnitOf(dimension);
      const productStatistics =
        targetUnit === null ? undefined : statistics.get(statisticsKey(product.code, targetUnit));

      if (!productStatistics) {
        logger.debug({ code: product.code, targetUnit }, 'No demand statistics for target unit');
        rows.push(missingStatisticsRow(product, dimension, stock, parameters));
        continue;
      }

      rows.push(
        calculateReplenishment(
          { product, dimension, stock, statistics: productStatistics },
          parameters
        )
      );
    }

    rows.sort(compareByUrgency);

    logger.info(
      {
        products: products.length,
        rows: rows.length,
        critical: rows.filter((row) => row.status === 'CRITICAL').length,
        replenish: rows.filter((row) => row.status === 'REPLENISH').length,
        verify: rows.filter((row) => row.status === 'VERIFY').length,
      },
      'Verification completed'
    );

    return rows;
  }
}

/**
 * Create a Replenishment Service instance.
 *
 * @param deps - Repositories (and optionally the record parsers)
 * @param config - Optional configuration overrides
 */
export function createReplenishmentService(
  deps: ReplenishmentServiceDeps,
  config?: Partial<ReplenishmentServiceConfig>
): ReplenishmentService {
  return new ReplenishmentService(deps, config);
}
