/**
 * @fileoverview Column value mapping shared by the PostgreSQL adapters
 *
 * The persisted schema keeps the Portuguese column names and value codes
 * of the stock spreadsheets it is loaded from; everything above the
 * adapters uses the English domain vocabulary.
 *
 * @module @clinistock/infrastructure/repositories/postgres-mappers
 */

import type { ConsumptionType } from '@clinistock/types';

const CONSUMPTION_TYPE_CODES = {
  fractional_dose: 'dose_fracionada',
  single_dose: 'dose_unica',
  excluded: 'excluir',
} as const satisfies Record<ConsumptionType, string>;

export type ConsumptionTypeCode = (typeof CONSUMPTION_TYPE_CODES)[ConsumptionType];

export function toConsumptionTypeCode(type: ConsumptionType): ConsumptionTypeCode {
  return CONSUMPTION_TYPE_CODES[type];
}

/**
 * Stored codes compare trimmed and case-insensitively; anything that is
 * neither a fractional dose nor an exclusion counts as a single dose
 */
export function fromConsumptionTypeCode(code: string | null): ConsumptionType {
  switch ((code ?? '').trim().toLowerCase()) {
    case CONSUMPTION_TYPE_CODES.fractional_dose:
      return 'fractional_dose';
    case CONSUMPTION_TYPE_CODES.excluded:
      return 'excluded';
    default:
      return 'single_dose';
  }
}

/**
 * NUMERIC columns arrive as strings, DOUBLE PRECISION as numbers
 */
export function numberOrNull(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function textOrNull(value: string | null | undefined): string | null {
  const trimmed = (value ?? '').trim();
  return trimmed.length > 0 ? trimmed : null;
}
