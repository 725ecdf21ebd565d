import { describe, it, expect } from 'vitest';
import { None, Some } from '@clinistock/types';
import {
  parseQuantityText,
  parseQuantity,
  parseDate,
  toYearMonth,
  addDays,
  todayIso,
} from '../quantity.js';

describe('parseQuantityText', () => {
  it.each([
    ['5.00 MG - MILIGRAMAS', { amount: 5, unit: 'MG', description: 'MILIGRAMAS' }],
    ['2 FR - Frascos', { amount: 2, unit: 'FR', description: 'Frascos' }],
    ['5,5 ml - mililitro', { amount: 5.5, unit: 'ML', description: 'mililitro' }],
    ['  10 amp  ', { amount: 10, unit: 'AMP', description: null }],
    ['3', { amount: 3, unit: null, description: null }],
    ['ML 4', { amount: null, unit: '4', description: null }],
  ])('should parse %j', (text, expected) => {
    expect(parseQuantityText(text)).toEqual(expected);
  });

  it('should treat empty and missing text as fully absent', () => {
    const absent = { amount: null, unit: null, description: null };
    expect(parseQuantityText('')).toEqual(absent);
    expect(parseQuantityText('   ')).toEqual(absent);
    expect(parseQuantityText(null)).toEqual(absent);
    expect(parseQuantityText(undefined)).toEqual(absent);
  });

  it('should take the number embedded in the first token', () => {
    expect(parseQuantityText('x12,25 UI').amount).toBe(12.25);
  });
});

describe('parseQuantity', () => {
  it('should return amount and unit when both are present', () => {
    expect(parseQuantity('4 ml - mililitro')).toEqual(Some({ amount: 4, unit: 'ML' }));
  });

  it('should return None without a unit', () => {
    expect(parseQuantity('4')).toBe(None);
  });

  it('should return None without an amount', () => {
    expect(parseQuantity('muitos ML')).toBe(None);
  });

  it('should keep zero as a real amount', () => {
    expect(parseQuantity('0 FR')).toEqual(Some({ amount: 0, unit: 'FR' }));
  });
});

describe('parseDate', () => {
  it('should accept ISO dates and drop any time part', () => {
    expect(parseDate('2024-03-05')).toEqual(Some('2024-03-05'));
    expect(parseDate('2024-03-05 14:30:00')).toEqual(Some('2024-03-05'));
    expect(parseDate('2024-03-05T14:30:00Z')).toEqual(Some('2024-03-05'));
  });

  it('should accept day-first dates', () => {
    expect(parseDate('5/3/2024')).toEqual(Some('2024-03-05'));
    expect(parseDate('05/03/2024 08:00')).toEqual(Some('2024-03-05'));
  });

  it('should reject impossible calendar dates', () => {
    expect(parseDate('2024-02-30')).toBe(None);
    expect(parseDate('31/04/2024')).toBe(None);
    expect(parseDate('2023-13-01')).toBe(None);
  });

  it('should accept leap days only in leap years', () => {
    expect(parseDate('2024-02-29')).toEqual(Some('2024-02-29'));
    expect(parseDate('2023-02-29')).toBe(None);
  });

  it('should reject free text', () => {
    expect(parseDate('ontem')).toBe(None);
    expect(parseDate('')).toBe(None);
    expect(parseDate(null)).toBe(None);
    expect(parseDate('2024-03-051')).toBe(None);
  });
});

describe('date helpers', () => {
  it('should bucket by year-month', () => {
    expect(toYearMonth('2024-03-05')).toBe('2024-03');
  });

  it('should add days across month and year boundaries', () => {
    expect(addDays('2024-12-25', 10)).toBe('2025-01-04');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
    expect(addDays('2024-03-01', 0)).toBe('2024-03-01');
  });

  it('should format today in UTC', () => {
    expect(todayIso(new Date('2024-07-01T23:59:00Z'))).toBe('2024-07-01');
  });
});
