/**
 * @fileoverview Replenishment Reports
 *
 * Filters and orderings over the verification report and the stored
 * aggregates. No report computes anything the core does not.
 *
 * @module domain/replenishment/report-service
 */

import { ValidationError, addDays, createLogger, parseDate, todayIso } from '@clinistock/core';
import {
  Option,
  YearMonthSchema,
  type ExpiringLotRow,
  type ExpiringProductRow,
  type ReplenishmentRow,
  type TopConsumptionRow,
} from '@clinistock/types';
import type {
  ICatalogRepository,
  IDemandRepository,
  IStockLedgerRepository,
  ReportConfig,
} from './interfaces.js';
import { DEFAULT_REPORT_CONFIG } from './interfaces.js';
import { STATUS_PRIORITY } from './policies.js';
import type { ReplenishmentService } from './replenishment-service.js';
import { normalizeUnit } from './unit-converter.js';

const logger = createLogger({ name: 'replenishment-reports' });

export interface ReportServiceDeps {
  readonly replenishment: Pick<ReplenishmentService, 'runVerification'>;
  readonly catalog: ICatalogRepository;
  readonly ledger: IStockLedgerRepository;
  readonly demand: IDemandRepository;
}

export interface ExpiryOptions {
  /** Days ahead of `today` to include (default 60) */
  readonly windowDays?: number;
  /** Reference date, `YYYY-MM-DD` (default: today in UTC) */
  readonly today?: string;
}

function requireNonNegative(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative number`, { [name]: value });
  }
  return value;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export class ReplenishmentReportService {
  private readonly config: ReportConfig;

  constructor(
    private readonly deps: ReportServiceDeps,
    config?: Partial<ReportConfig>
  ) {
    this.config = { ...DEFAULT_REPORT_CONFIG, ...config };
  }

  /**
   * Products whose stock covers at most `horizonDays` of demand
   */
  async ruptureAlert(
    horizonDays: number = this.config.ruptureHorizonDays
  ): Promise<ReplenishmentRow[]> {
    const horizon = requireNonNegative('horizonDays', horizonDays);
    const rows = await this.deps.replenishment.runVerification();

    const alerts = rows
      .filter(
        (row) =>
          row.demandMean !== null &&
          row.demandMean > 0 &&
          row.coverageDays !== null &&
          row.coverageDays <= horizon
      )
      .sort((a, b) => (a.coverageDays ?? 0) - (b.coverageDays ?? 0));

    logger.info({ horizonDays: horizon, alerts: alerts.length }, 'Rupture alert computed');
    return alerts;
  }

  /**
   * Lots expiring on or before `today + windowDays`, already-expired lots included
   *
   * @returns Ordered by expiry date, code, lot
   */
  async expiringLots(options: ExpiryOptions = {}): Promise<ExpiringLotRow[]> {
    const windowDays = requireNonNegative(
      'windowDays',
      options.windowDays ?? this.config.expiryWindowDays
    );
    const today = this.referenceDate(options.today);
    const limit = addDays(today, Math.trunc(windowDays));

    const lots = await this.deps.ledger.getLots();
    const expiring: ExpiringLotRow[] = [];

    for (const lot of lots) {
      const expiryDate = Option.toNullable(
        Option.flatMap(Option.fromNullable(lot.expiryDate), parseDate)
      );
      if (expiryDate === null || expiryDate > limit) continue;

      expiring.push({
        code: lot.code,
        lot: lot.lot,
        expiryDate,
        presentationQuantity: lot.presentationQuantity ?? 0,
        presentationUnit: normalizeUnit(lot.presentationUnit),
        clinicalQuantity: lot.clinicalQuantity ?? 0,
        clinicalUnit: normalizeUnit(lot.clinicalUnit),
      });
    }

    return expiring.sort(
      (a, b) =>
        compareText(a.expiryDate, b.expiryDate) ||
        compareText(a.code, b.code) ||
        compareText(a.lot, b.lot)
    );
  }

  /**
   * Expiring lots aggregated per product with the earliest expiry
   *
   * @returns Ordered by earliest expiry, then code
   */
  async expiringProducts(options: ExpiryOptions = {}): Promise<ExpiringProductRow[]> {
    const lots = await this.expiringLots(options);
    const byCode = new Map<string, ExpiringProductRow>();

    for (const lot of lots) {
      const current = byCode.get(lot.code);
      byCode.set(lot.code, {
        code: lot.code,
        earliestExpiry:
          current && current.earliestExpiry <= lot.expiryDate
            ? current.earliestExpiry
            : lot.expiryDate,
        lotCount: (current?.lotCount ?? 0) + 1,
        presentationQuantity: (current?.presentationQuantity ?? 0) + lot.presentationQuantity,
        presentationUnit: current?.presentationUnit ?? lot.presentationUnit,
        clinicalQuantity: (current?.clinicalQuantity ?? 0) + lot.clinicalQuantity,
        clinicalUnit: current?.clinicalUnit ?? lot.clinicalUnit,
      });
    }

    return [...byCode.values()].sort(
      (a, b) => compareText(a.earliestExpiry, b.earliestExpiry) || compareText(a.code, b.code)
    );
  }

  /**
   * Highest total monthly demand within an inclusive `YYYY-MM` range
   */
  async topConsumption(
    fromYearMonth: string,
    toYearMonth: string,
    limit: number = this.config.topConsumptionLimit
  ): Promise<TopConsumptionRow[]> {
    for (const [name, value] of [
      ['from', fromYearMonth],
      ['to', toYearMonth],
    ] as const) {
      if (!YearMonthSchema.safeParse(value).success) {
        throw new ValidationError(`${name} must use YYYY-MM`, { [name]: value });
      }
    }
    const top = Math.max(0, Math.trunc(requireNonNegative('limit', limit)));

    const [monthly, products] = await Promise.all([
      this.deps.demand.getMonthlyDemand(),
      this.deps.catalog.getProducts(),
    ]);
    const names = new Map(products.map((product) => [product.code, product.name]));

    const totals = new Map<string, number>();
    for (const row of monthly) {
      if (row.yearMonth < fromYearMonth || row.yearMonth > toYearMonth) continue;
      totals.set(row.code, (totals.get(row.code) ?? 0) + row.total);
    }

    return [...totals.entries()]
      .map(([code, total]) => ({ code, name: names.get(code) ?? null, total }))
      .sort((a, b) => b.total - a.total || compareText(a.code, b.code))
      .slice(0, top);
  }

  /**
   * CRITICAL and REPLENISH rows: critical first, then larger shortfall first
   */
  async replenishmentList(): Promise<ReplenishmentRow[]> {
    const rows = await this.deps.replenishment.runVerification();

    return rows
      .filter((row) => row.status === 'CRITICAL' || row.status === 'REPLENISH')
      .sort(
        (a, b) =>
          STATUS_PRIORITY[a.status] - STATUS_PRIORITY[b.status] ||
          (b.shortfall ?? 0) - (a.shortfall ?? 0)
      );
  }

  private referenceDate(today: string | undefined): string {
    if (today === undefined) return todayIso();
    const parsed = Option.toNullable(parseDate(today));
    if (parsed === null) {
      throw new ValidationError('today must be a date', { today });
    }
    return parsed;
  }
}

export function createReplenishmentReportService(
  deps: ReportServiceDeps,
  config?: Partial<ReportConfig>
): ReplenishmentReportService {
  return new ReplenishmentReportService(deps, config);
}
