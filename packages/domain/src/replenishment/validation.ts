import { ValidationError } from '@clinistock/core';
import type { z } from 'zod';

/**
 * Validate input against a schema, as a ValidationError on failure
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}`, result.error.flatten());
  }
  return result.data;
}

/**
 * Keys that occur more than once, each reported once in first-seen order
 */
export function duplicateKeys(keys: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const key of keys) {
    if (seen.has(key)) repeated.add(key);
    seen.add(key);
  }
  return [...repeated];
}
