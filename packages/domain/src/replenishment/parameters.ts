/**
 * @fileoverview Global parameter resolution
 *
 * Stored parameters are strings in a key/value table. A key that is unset
 * or blank takes its default; a value that is present but not a number, or
 * a combination out of range, is rejected outright.
 *
 * @module domain/replenishment/parameters
 */

import { ValidationError } from '@clinistock/core';
import {
  PARAMETER_KEYS,
  ReplenishmentParametersSchema,
  type ReplenishmentParameters,
} from '@clinistock/types';

type ParameterName = keyof ReplenishmentParameters;

const PARAMETER_NAMES = Object.keys(PARAMETER_KEYS).filter(
  (name): name is ParameterName => name in PARAMETER_KEYS
);

function parseStoredNumber(key: string, raw: string): number {
  const parsed = Number(raw.trim().replace(',', '.'));
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`Parameter ${key} is not a number: "${raw}"`, { key, value: raw });
  }
  return parsed;
}

/**
 * Resolve the explicit parameter object from stored values and defaults
 *
 * @throws ValidationError on a malformed or out-of-range value
 */
export function resolveParameters(
  stored: Readonly<Record<string, string>>,
  defaults: ReplenishmentParameters
): ReplenishmentParameters {
  const candidate: ReplenishmentParameters = { ...defaults };

  for (const name of PARAMETER_NAMES) {
    const key = PARAMETER_KEYS[name];
    const raw = stored[key];
    if (raw === undefined || raw.trim() === '') continue;
    candidate[name] = parseStoredNumber(key, raw);
  }

  return validateParameters(candidate);
}

/**
 * @throws ValidationError unless 0 < serviceLevel < 1 and lead times are non-negative
 */
export function validateParameters(candidate: unknown): ReplenishmentParameters {
  const result = ReplenishmentParametersSchema.safeParse(candidate);
  if (!result.success) {
    throw new ValidationError(
      'Invalid replenishment parameters',
      result.error.flatten().fieldErrors
    );
  }
  return result.data;
}

/**
 * Encode parameters for the key/value store
 */
export function encodeParameters(
  values: Partial<ReplenishmentParameters>
): Record<string, string> {
  const encoded: Record<string, string> = {};
  for (const name of PARAMETER_NAMES) {
    const value = values[name];
    if (value !== undefined) encoded[PARAMETER_KEYS[name]] = String(value);
  }
  return encoded;
}
