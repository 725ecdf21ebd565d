/**
 * @fileoverview Option type for values that may be legitimately absent
 *
 * Keeps "no value" distinguishable from zero: a unit conversion that cannot
 * be resolved, a free-text quantity that does not parse, a date that is not
 * a date.
 *
 * @module @clinistock/types/option
 */

export interface Some<T> {
  readonly _tag: 'Some';
  readonly value: T;
}

export interface None {
  readonly _tag: 'None';
}

/**
 * @example
 * const ml = convert(2, 'FR', 'ML', conversion);
 * if (isSome(ml)) total += ml.value;
 */
export type Option<T> = Some<T> | None;

export function Some<T>(value: T): Some<T> {
  return { _tag: 'Some', value };
}

export const None: None = Object.freeze({ _tag: 'None' });

export function isSome<T>(option: Option<T>): option is Some<T> {
  return option._tag === 'Some';
}

export function isNone<T>(option: Option<T>): option is None {
  return option._tag === 'None';
}

/**
 * Combinators over Option, grouped under the type's name
 */
export const Option = {
  fromNullable<T>(value: T | null | undefined): Option<T> {
    return value === null || value === undefined ? None : Some(value);
  },

  map<T, U>(option: Option<T>, fn: (value: T) => U): Option<U> {
    return isNone(option) ? None : Some(fn(option.value));
  },

  /** Chains a step that may itself come up empty, e.g. nullable text into a date parse */
  flatMap<T, U>(option: Option<T>, fn: (value: T) => Option<U>): Option<U> {
    return isNone(option) ? None : fn(option.value);
  },

  unwrapOr<T>(option: Option<T>, fallback: T): T {
    return isNone(option) ? fallback : option.value;
  },

  /** Record fields model absence as null */
  toNullable<T>(option: Option<T>): T | null {
    return isNone(option) ? null : option.value;
  },
} as const;
