/**
 * @fileoverview Unit Converter
 *
 * Converts quantities between a product's presentation unit (vial, box)
 * and its clinical unit (ML, MG) using the dimension's fixed factor.
 * Multiplying by the factor moves presentation to clinical; dividing moves
 * back. An unresolved conversion is None, never zero.
 *
 * @module domain/replenishment/unit-converter
 */

import { None, Some, type ConsumptionDimension, type Option } from '@clinistock/types';

/**
 * The two units a product is counted in and the factor between them
 */
export interface UnitConversion {
  readonly presentationUnit: string | null;
  readonly clinicalUnit: string | null;
  /** Presentation to clinical multiplier */
  readonly factor: number | null;
}

/**
 * Canonical unit code: trimmed, upper-cased, blank as absent
 */
export function normalizeUnit(unit: string | null | undefined): string | null {
  const normalized = (unit ?? '').trim().toUpperCase();
  return normalized.length > 0 ? normalized : null;
}

export function unitConversionOf(dimension: ConsumptionDimension): UnitConversion {
  return {
    presentationUnit: normalizeUnit(dimension.presentationUnit),
    clinicalUnit: normalizeUnit(dimension.clinicalUnit),
    factor: dimension.conversionFactor,
  };
}

/**
 * Unit demand and stock are measured in: clinical for fractional-dose
 * products, presentation otherwise
 */
export function targetUnitOf(dimension: ConsumptionDimension): string | null {
  return dimension.consumptionType === 'fractional_dose'
    ? normalizeUnit(dimension.clinicalUnit)
    : normalizeUnit(dimension.presentationUnit);
}

/**
 * Convert `quantity` from `sourceUnit` to `targetUnit`
 *
 * @example
 * const vials = { presentationUnit: 'FR', clinicalUnit: 'ML', factor: 10 };
 * convert(2, 'FR', 'ML', vials); // Some(20)
 * convert(5, 'ML', 'FR', vials); // Some(0.5)
 * convert(5, 'MG', 'FR', vials); // None
 */
export function convert(
  quantity: number,
  sourceUnit: string | null,
  targetUnit: string | null,
  conversion: UnitConversion
): Option<number> {
  const source = normalizeUnit(sourceUnit);
  const target = normalizeUnit(targetUnit);
  if (source === null || target === null) return None;
  if (source === target) return Some(quantity);

  const { factor } = conversion;
  if (factor === null || factor === 0 || !Number.isFinite(factor)) return None;

  const presentation = normalizeUnit(conversion.presentationUnit);
  const clinical = normalizeUnit(conversion.clinicalUnit);

  if (source === presentation && target === clinical) return Some(quantity * factor);
  if (source === clinical && target === presentation) return Some(quantity / factor);
  return None;
}
