/**
 * @fileoverview Replenishment Formulas
 *
 * Continuous-review policy under independent demand and lead-time
 * variability:
 *
 *   mu_DL    = mu_d * mu_t
 *   sigma_DL = sqrt(mu_t * sigma_d^2 + mu_d^2 * sigma_t^2)
 *   SS       = z * sigma_DL
 *   ROP      = mu_DL + SS
 *
 * @module domain/replenishment/formulas
 */

import { ValidationError } from '@clinistock/core';

// Rational approximation of the inverse standard normal CDF
// (relative error below 1.15e-9 over the whole open interval)
const A = [
  -3.969683028665376e1, 2.209460984245205e2, -2.759285104469687e2, 1.38357751867269e2,
  -3.066479806614716e1, 2.506628277459239,
] as const;
const B = [
  -5.447609879822406e1, 1.615858368580409e2, -1.556989798598866e2, 6.680131188771972e1,
  -1.328068155288572e1,
] as const;
const C = [
  -7.784894002430293e-3, -3.223964580411365e-1, -2.400758277161838, -2.549732539343734,
  4.374664141464968, 2.938163982698783,
] as const;
const D = [
  7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996, 3.754408661907416,
] as const;

const P_LOW = 0.02425;
const P_HIGH = 1 - P_LOW;

function tail(q: number): number {
  return (
    (((((C[0] * q + C[1]) * q + C[2]) * q + C[3]) * q + C[4]) * q + C[5]) /
    ((((D[0] * q + D[1]) * q + D[2]) * q + D[3]) * q + 1)
  );
}

/**
 * Inverse of the standard normal cumulative distribution function
 *
 * @throws ValidationError unless 0 < p < 1
 */
export function inverseNormalCdf(p: number): number {
  if (!Number.isFinite(p) || p <= 0 || p >= 1) {
    throw new ValidationError(`Probability must be strictly between 0 and 1, got ${p}`, { p });
  }

  if (p < P_LOW) {
    return tail(Math.sqrt(-2 * Math.log(p)));
  }

  if (p <= P_HIGH) {
    const q = p - 0.5;
    const r = q * q;
    return (
      ((((((A[0] * r + A[1]) * r + A[2]) * r + A[3]) * r + A[4]) * r + A[5]) * q) /
      (((((B[0] * r + B[1]) * r + B[2]) * r + B[3]) * r + B[4]) * r + 1)
    );
  }

  return -tail(Math.sqrt(-2 * Math.log(1 - p)));
}

/**
 * Safety factor for a target service level
 *
 * @throws ValidationError unless 0 < serviceLevel < 1
 */
export function zScore(serviceLevel: number): number {
  return inverseNormalCdf(serviceLevel);
}

/**
 * Expected demand over the lead time
 */
export function leadTimeDemandMean(demandMean: number, leadTimeMean: number): number {
  return demandMean * leadTimeMean;
}

/**
 * Standard deviation of demand over the lead time; the radicand is
 * clamped at zero
 */
export function leadTimeDemandStdDev(
  demandMean: number,
  demandStdDev: number,
  leadTimeMean: number,
  leadTimeStdDev: number
): number {
  const variance =
    leadTimeMean * demandStdDev ** 2 + demandMean ** 2 * leadTimeStdDev ** 2;
  return Math.sqrt(Math.max(0, variance));
}

export function safetyStock(z: number, leadTimeStdDevDemand: number): number {
  return z * leadTimeStdDevDemand;
}

export function reorderPoint(leadTimeMeanDemand: number, safety: number): number {
  return leadTimeMeanDemand + safety;
}

export function shortfall(reorder: number, currentStock: number): number {
  return Math.max(0, reorder - currentStock);
}

/**
 * Days of demand the current stock covers; null without positive demand
 */
export function coverageDays(currentStock: number, demandMean: number): number | null {
  return demandMean > 0 ? currentStock / demandMean : null;
}
