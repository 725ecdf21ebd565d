/**
 * @fileoverview Demand Rebuilder
 *
 * Projects the exit log onto daily and monthly demand series, each exit
 * converted to its product's target unit. The projection is total: its
 * output is the entire new state of both series.
 *
 * @module domain/replenishment/demand-rebuilder
 */

import { parseDate, parseQuantity, toYearMonth } from '@clinistock/core';
import {
  isNone,
  type ConsumptionDimension,
  type DailyDemand,
  type ExitRecord,
  type MonthlyDemand,
} from '@clinistock/types';
import type { RecordParsers } from './interfaces.js';
import { convert, targetUnitOf, unitConversionOf } from './unit-converter.js';

// ============================================================================
// TYPES
// ============================================================================

export type SkipReason =
  | 'discarded'
  | 'excluded_product'
  | 'missing_dimension'
  | 'unparsable_quantity'
  | 'unparsable_date'
  | 'unresolved_conversion';

export interface DemandRebuildResult {
  /** Ordered by date, code, unit */
  readonly daily: DailyDemand[];
  /** Ordered by year-month, code, unit */
  readonly monthly: MonthlyDemand[];
  /** Exits that contributed to a bucket */
  readonly accepted: number;
  readonly skipped: Readonly<Record<SkipReason, number>>;
}

export const DEFAULT_PARSERS: RecordParsers = { parseQuantity, parseDate };

// ============================================================================
// REBUILD
// ============================================================================

const KEY_SEPARATOR = '\u0000';

function bucketKey(period: string, code: string, unit: string): string {
  return [period, code, unit].join(KEY_SEPARATOR);
}

function splitKey(key: string): [string, string, string] {
  const [period = '', code = '', unit = ''] = key.split(KEY_SEPARATOR);
  return [period, code, unit];
}

function compareKeys(a: string, b: string): number {
  const left = splitKey(a);
  const right = splitKey(b);
  for (let i = 0; i < left.length; i++) {
    const l = left[i] ?? '';
    const r = right[i] ?? '';
    if (l !== r) return l < r ? -1 : 1;
  }
  return 0;
}

/**
 * Rebuild daily and monthly demand from the exit log
 *
 * Discarded exits, exits of excluded products or products without a
 * dimension, unparsable quantities or dates and unresolved conversions
 * are skipped one record at a time; they never abort the rebuild.
 */
export function rebuildDemandSeries(
  exits: readonly ExitRecord[],
  dimensionsByCode: ReadonlyMap<string, ConsumptionDimension>,
  parsers: RecordParsers = DEFAULT_PARSERS
): DemandRebuildResult {
  const skipped: Record<SkipReason, number> = {
    discarded: 0,
    excluded_product: 0,
    missing_dimension: 0,
    unparsable_quantity: 0,
    unparsable_date: 0,
    unresolved_conversion: 0,
  };
  const dailyTotals = new Map<string, number>();
  let accepted = 0;

  for (const exit of exits) {
    if (exit.discarded) {
      skipped.discarded++;
      continue;
    }

    const dimension = dimensionsByCode.get(exit.code);
    if (!dimension) {
      skipped.missing_dimension++;
      continue;
    }
    if (dimension.consumptionType === 'excluded') {
      skipped.excluded_product++;
      continue;
    }

    const quantity = parsers.parseQuantity(exit.rawQuantity);
    if (isNone(quantity)) {
      skipped.unparsable_quantity++;
      continue;
    }

    const targetUnit = targetUnitOf(dimension);
    const converted = convert(
      quantity.value.amount,
      quantity.value.unit,
      targetUnit,
      unitConversionOf(dimension)
    );
    if (targetUnit === null || isNone(converted)) {
      skipped.unresolved_conversion++;
      continue;
    }

    const date = parsers.parseDate(exit.date);
    if (isNone(date)) {
      skipped.unparsable_date++;
      continue;
    }

    const key = bucketKey(date.value, exit.code, targetUnit);
    dailyTotals.set(key, (dailyTotals.get(key) ?? 0) + converted.value);
    accepted++;
  }

  const daily: DailyDemand[] = [...dailyTotals.keys()].sort(compareKeys).map((key) => {
    const [date, code, unit] = splitKey(key);
    return { date, code, unit, total: dailyTotals.get(key) ?? 0 };
  });

  return { daily, monthly: aggregateMonthly(daily), accepted, skipped };
}

/**
 * Re-key daily buckets by year-month and sum
 */
export function aggregateMonthly(daily: readonly DailyDemand[]): MonthlyDemand[] {
  const monthlyTotals = new Map<string, number>();
  for (const row of daily) {
    const key = bucketKey(toYearMonth(row.date), row.code, row.unit);
    monthlyTotals.set(key, (monthlyTotals.get(key) ?? 0) + row.total);
  }

  return [...monthlyTotals.keys()].sort(compareKeys).map((key) => {
    const [yearMonth, code, unit] = splitKey(key);
    return { yearMonth, code, unit, total: monthlyTotals.get(key) ?? 0 };
  });
}

/**
 * Index dimensions by product code
 */
export function indexDimensions(
  dimensions: readonly ConsumptionDimension[]
): Map<string, ConsumptionDimension> {
  return new Map(dimensions.map((dimension) => [dimension.code, dimension]));
}
