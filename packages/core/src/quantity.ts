/**
 * @fileoverview Free-text quantity and date parsing
 *
 * Spreadsheet-sourced transaction rows carry quantities such as
 * `"5,5 ml - mililitro"` and dates in either ISO or day-first form. Parsing
 * is best-effort: anything that does not parse comes back as None and the
 * caller skips that single record.
 *
 * @module @clinistock/core/quantity
 */

import { None, Option, Some } from '@clinistock/types';

// ============================================================================
// QUANTITY
// ============================================================================

export interface QuantityText {
  /** Numeric amount, decimal comma accepted */
  readonly amount: number | null;
  /** Second whitespace token before the first hyphen, upper-cased */
  readonly unit: string | null;
  /** Text after the first hyphen */
  readonly description: string | null;
}

export interface ParsedQuantity {
  readonly amount: number;
  readonly unit: string;
}

const NUMBER_PATTERN = /[-+]?\d+(?:[.,]\d+)?/;

/**
 * Split a `"<amount> <unit> - <description>"` string into its parts
 *
 * @example
 * parseQuantityText('5.00 MG - Miligrama'); // { amount: 5, unit: 'MG', description: 'Miligrama' }
 * parseQuantityText('2 fr');                // { amount: 2, unit: 'FR', description: null }
 */
export function parseQuantityText(text: string | null | undefined): QuantityText {
  const trimmed = (text ?? '').trim();
  if (!trimmed) {
    return { amount: null, unit: null, description: null };
  }

  const hyphen = trimmed.indexOf('-');
  const head = (hyphen >= 0 ? trimmed.slice(0, hyphen) : trimmed).trim();
  const description = hyphen >= 0 ? trimmed.slice(hyphen + 1).trim() || null : null;
  const parts = head.split(/\s+/).filter((part) => part.length > 0);

  let amount: number | null = null;
  const match = parts[0] !== undefined ? NUMBER_PATTERN.exec(parts[0]) : null;
  if (match) {
    const parsed = Number(match[0].replace(',', '.'));
    amount = Number.isFinite(parsed) ? parsed : null;
  }

  const unit = parts[1] !== undefined ? parts[1].toUpperCase() : null;

  return { amount, unit, description };
}

/**
 * Parse a quantity that must carry both an amount and a unit
 */
export function parseQuantity(text: string | null | undefined): Option<ParsedQuantity> {
  const { amount, unit } = parseQuantityText(text);
  if (amount === null || unit === null) return None;
  return Some({ amount, unit });
}

// ============================================================================
// DATE
// ============================================================================

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T\s])/;
const DAY_FIRST_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:$|\s)/;

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

function formatIsoDate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Normalize a raw date to `YYYY-MM-DD`
 *
 * Accepts an ISO date, optionally followed by a time part, or `DD/MM/YYYY`.
 */
export function parseDate(text: string | null | undefined): Option<string> {
  const trimmed = (text ?? '').trim();

  const iso = ISO_DATE_PREFIX.exec(trimmed);
  const dayFirst = iso ? null : DAY_FIRST_DATE.exec(trimmed);

  let year: number;
  let month: number;
  let day: number;
  if (iso) {
    [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
  } else if (dayFirst) {
    [day, month, year] = [Number(dayFirst[1]), Number(dayFirst[2]), Number(dayFirst[3])];
  } else {
    return None;
  }

  return isCalendarDate(year, month, day) ? Some(formatIsoDate(year, month, day)) : None;
}

/**
 * `YYYY-MM` bucket of a normalized date
 */
export function toYearMonth(isoDate: string): string {
  return isoDate.slice(0, 7);
}

/**
 * Add whole days to a `YYYY-MM-DD` date
 */
export function addDays(isoDate: string, days: number): string {
  const [year, month, day] = isoDate.split('-').map(Number);
  const date = new Date(Date.UTC(year ?? 1970, (month ?? 1) - 1, (day ?? 1) + days));
  return date.toISOString().slice(0, 10);
}

/**
 * Today's date in UTC as `YYYY-MM-DD`
 */
export function todayIso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}
