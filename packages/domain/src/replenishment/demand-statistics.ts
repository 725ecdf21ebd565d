/**
 * @fileoverview Demand Statistics Estimator
 *
 * Mean and population standard deviation of daily demand per
 * (product, unit). Only days present in the series count: a day without
 * any exit is absent, not a zero observation, which raises the mean of
 * sparse products relative to a calendar-day average.
 *
 * @module domain/replenishment/demand-statistics
 */

import type { DailyDemand, DemandStatistics } from '@clinistock/types';

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * Population standard deviation; 0 below two observations
 */
export function populationStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const mu = mean(values);
  let squares = 0;
  for (const value of values) squares += (value - mu) ** 2;
  return Math.sqrt(squares / values.length);
}

export function statisticsKey(code: string, unit: string): string {
  return `${code}\u0000${unit.toUpperCase()}`;
}

/**
 * Estimate demand statistics from the daily series
 *
 * @returns One entry per (code, unit), ordered by code then unit
 */
export function estimateDemandStatistics(daily: readonly DailyDemand[]): DemandStatistics[] {
  const series = new Map<string, { code: string; unit: string; values: number[] }>();

  for (const row of daily) {
    if (!Number.isFinite(row.total)) continue;
    const key = statisticsKey(row.code, row.unit);
    const entry = series.get(key);
    if (entry) {
      entry.values.push(row.total);
    } else {
      series.set(key, { code: row.code, unit: row.unit.toUpperCase(), values: [row.total] });
    }
  }

  return [...series.values()]
    .sort((a, b) => (a.code === b.code ? compare(a.unit, b.unit) : compare(a.code, b.code)))
    .map(({ code, unit, values }) => ({
      code,
      unit,
      mean: mean(values),
      stdDev: populationStdDev(values),
      observations: values.length,
    }));
}

/**
 * Index statistics by (code, unit)
 */
export function indexStatistics(
  statistics: readonly DemandStatistics[]
): Map<string, DemandStatistics> {
  return new Map(statistics.map((entry) => [statisticsKey(entry.code, entry.unit), entry]));
}

function compare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
