/**
 * @fileoverview Lot Consolidator
 *
 * Reduces per-lot physical stock to one total per product in each scale.
 *
 * @module domain/replenishment/lot-consolidator
 */

import type { ConsolidatedStock, LotSnapshot } from '@clinistock/types';
import { normalizeUnit } from './unit-converter.js';

interface StockAccumulator {
  presentationQuantity: number;
  presentationUnit: string | null;
  clinicalQuantity: number;
  clinicalUnit: string | null;
}

/**
 * Sum lot quantities per product
 *
 * Missing numeric quantities count as zero. The unit reported for each
 * scale is the first non-null one seen, since all lots of a product share
 * their units. Every code in `productCodes` without lots consolidates to
 * zero in both scales.
 *
 * @returns Rows keyed by product code, in ascending code order
 */
export function consolidateLots(
  lots: readonly LotSnapshot[],
  productCodes: readonly string[] = []
): Map<string, ConsolidatedStock> {
  const totals = new Map<string, StockAccumulator>();

  const accumulatorFor = (code: string): StockAccumulator => {
    let accumulator = totals.get(code);
    if (!accumulator) {
      accumulator = {
        presentationQuantity: 0,
        presentationUnit: null,
        clinicalQuantity: 0,
        clinicalUnit: null,
      };
      totals.set(code, accumulator);
    }
    return accumulator;
  };

  for (const code of productCodes) {
    accumulatorFor(code);
  }

  for (const lot of lots) {
    const accumulator = accumulatorFor(lot.code);
    accumulator.presentationQuantity += lot.presentationQuantity ?? 0;
    accumulator.clinicalQuantity += lot.clinicalQuantity ?? 0;
    accumulator.presentationUnit ??= normalizeUnit(lot.presentationUnit);
    accumulator.clinicalUnit ??= normalizeUnit(lot.clinicalUnit);
  }

  const result = new Map<string, ConsolidatedStock>();
  for (const code of [...totals.keys()].sort()) {
    const accumulator = totals.get(code);
    if (accumulator) {
      result.set(code, { code, ...accumulator });
    }
  }
  return result;
}

/**
 * Zero stock for a product with no lots
 */
export function emptyStock(code: string): ConsolidatedStock {
  return {
    code,
    presentationQuantity: 0,
    presentationUnit: null,
    clinicalQuantity: 0,
    clinicalUnit: null,
  };
}
