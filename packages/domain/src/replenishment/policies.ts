/**
 * @fileoverview Replenishment Policies
 *
 * Lot-size rounding, urgency classification and report ordering.
 *
 * @module domain/replenishment/policies
 */

import type { Product, ReplenishmentRow, UrgencyStatus } from '@clinistock/types';

/**
 * Round `x` up to the nearest multiple of `multiple`
 *
 * A missing, zero or negative multiple leaves `x` unchanged.
 */
export function roundUpToMultiple(x: number, multiple: number | null | undefined): number {
  if (multiple === null || multiple === undefined || !(multiple > 0)) return x;
  return Math.ceil(x / multiple) * multiple;
}

/**
 * Suggested order quantity for a shortfall
 *
 * Rounds up to the product's lot multiple, then raises a positive result
 * to the lot minimum. Never rounds down.
 */
export function applyLotPolicy(
  quantity: number,
  product: Pick<Product, 'lotMinimum' | 'lotMultiple'>
): number {
  const rounded = roundUpToMultiple(quantity, product.lotMultiple);
  const { lotMinimum } = product;
  if (lotMinimum !== null && lotMinimum > 0 && rounded > 0 && rounded < lotMinimum) {
    return lotMinimum;
  }
  return rounded;
}

function isNumber(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Urgency of a product from its stock position
 *
 * Both boundaries are inclusive on the low side: stock equal to the safety
 * stock is CRITICAL, stock equal to the reorder point is REPLENISH.
 */
export function classifyStatus(
  currentStock: number | null | undefined,
  safety: number | null | undefined,
  reorder: number | null | undefined
): UrgencyStatus {
  if (!isNumber(currentStock) || !isNumber(safety) || !isNumber(reorder)) return 'VERIFY';
  if (currentStock <= safety) return 'CRITICAL';
  if (currentStock <= reorder) return 'REPLENISH';
  return 'OK';
}

export const STATUS_PRIORITY: Readonly<Record<UrgencyStatus, number>> = {
  CRITICAL: 0,
  REPLENISH: 1,
  OK: 2,
  VERIFY: 3,
};

/**
 * Verification report order: urgency, then coverage ascending with
 * missing coverage last
 */
export function compareByUrgency(
  a: Pick<ReplenishmentRow, 'status' | 'coverageDays'>,
  b: Pick<ReplenishmentRow, 'status' | 'coverageDays'>
): number {
  const byStatus = STATUS_PRIORITY[a.status] - STATUS_PRIORITY[b.status];
  if (byStatus !== 0) return byStatus;

  const left = a.coverageDays ?? Number.POSITIVE_INFINITY;
  const right = b.coverageDays ?? Number.POSITIVE_INFINITY;
  if (left === right) return 0;
  return left < right ? -1 : 1;
}
