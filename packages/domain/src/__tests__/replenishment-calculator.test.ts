/**
 * @fileoverview Replenishment calculator and parameter resolution tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '@clinistock/core';
import type { ConsolidatedStock, ReplenishmentParameters } from '@clinistock/types';
import {
  calculateReplenishment,
  missingDimensionRow,
  missingStatisticsRow,
  targetStockOf,
} from '../replenishment/replenishment-calculator.js';
import {
  encodeParameters,
  resolveParameters,
  validateParameters,
} from '../replenishment/parameters.js';
import { dimension, product } from './replenishment-fixtures.js';

const parameters: ReplenishmentParameters = {
  serviceLevel: 0.95,
  leadTimeMeanDays: 6,
  leadTimeStdDevDays: 1,
};

const stock: ConsolidatedStock = {
  code: 'P1',
  presentationQuantity: 3,
  presentationUnit: 'FR',
  clinicalQuantity: 30,
  clinicalUnit: 'ML',
};

describe('calculateReplenishment', () => {
  const p1 = product('P1', { lotMinimum: 1, lotMultiple: 1 });

  it('computes the full chain for a fractional-dose product', () => {
    const row = calculateReplenishment(
      {
        product: p1,
        dimension: dimension('P1'),
        stock,
        statistics: { mean: 4, stdDev: Math.sqrt(0.5) },
      },
      parameters
    );

    expect(row.targetUnit).toBe('ML');
    expect(row.currentStock).toBe(30);
    expect(row.zScore).toBeCloseTo(1.6448536, 6);
    expect(row.leadTimeDemandMean).toBe(24);
    expect(row.leadTimeDemandStdDev).toBeCloseTo(4.358899, 6);
    expect(row.safetyStock).toBeCloseTo(7.169751, 5);
    expect(row.reorderPoint).toBeCloseTo(31.169751, 5);
    expect(row.shortfall).toBeCloseTo(1.169751, 5);
    expect(row.suggestedClinicalQuantity).toBe(2);
    expect(row.suggestedPresentationQuantity).toBe(1);
    expect(row.coverageDays).toBe(7.5);
    expect(row.status).toBe('REPLENISH');
    expect(row.gap).toBeNull();
  });

  it('measures single-dose products in the presentation scale', () => {
    const row = calculateReplenishment(
      {
        product: product('P1', { lotMultiple: 5 }),
        dimension: dimension('P1', { consumptionType: 'single_dose' }),
        stock,
        statistics: { mean: 2, stdDev: 0 },
      },
      { ...parameters, leadTimeStdDevDays: 0 }
    );

    // SS = 0, ROP = 12, stock 3
    expect(row.targetUnit).toBe('FR');
    expect(row.currentStock).toBe(3);
    expect(row.safetyStock).toBe(0);
    expect(row.reorderPoint).toBe(12);
    expect(row.shortfall).toBe(9);
    expect(row.suggestedPresentationQuantity).toBe(10);
    expect(row.suggestedClinicalQuantity).toBe(100);
    expect(row.coverageDays).toBe(1.5);
    expect(row.status).toBe('REPLENISH');
  });

  it('is CRITICAL with no stock at all', () => {
    const row = calculateReplenishment(
      {
        product: p1,
        dimension: dimension('P1'),
        stock: { ...stock, clinicalQuantity: 0 },
        statistics: { mean: 4, stdDev: Math.sqrt(0.5) },
      },
      parameters
    );

    expect(row.status).toBe('CRITICAL');
    expect(row.coverageDays).toBe(0);
    expect(row.suggestedClinicalQuantity).toBe(32);
  });

  it('is OK with nothing to order when stock exceeds the reorder point', () => {
    const row = calculateReplenishment(
      {
        product: p1,
        dimension: dimension('P1'),
        stock: { ...stock, clinicalQuantity: 100 },
        statistics: { mean: 4, stdDev: Math.sqrt(0.5) },
      },
      parameters
    );

    expect(row.status).toBe('OK');
    expect(row.shortfall).toBe(0);
    expect(row.suggestedClinicalQuantity).toBe(0);
    expect(row.suggestedPresentationQuantity).toBe(0);
  });

  it('leaves the other scale empty when the conversion is unresolved', () => {
    const row = calculateReplenishment(
      {
        product: p1,
        dimension: dimension('P1', { conversionFactor: null }),
        stock,
        statistics: { mean: 4, stdDev: Math.sqrt(0.5) },
      },
      parameters
    );

    expect(row.suggestedClinicalQuantity).toBe(2);
    expect(row.suggestedPresentationQuantity).toBeNull();
  });

  it('rejects an invalid service level', () => {
    expect(() =>
      calculateReplenishment(
        {
          product: p1,
          dimension: dimension('P1'),
          stock,
          statistics: { mean: 4, stdDev: 1 },
        },
        { ...parameters, serviceLevel: 1 }
      )
    ).toThrow(ValidationError);
  });
});

describe('VERIFY rows', () => {
  it('carries only identity for a product without a dimension', () => {
    const row = missingDimensionRow(product('P9', { name: 'Gauze' }));

    expect(row).toMatchObject({
      code: 'P9',
      name: 'Gauze',
      status: 'VERIFY',
      gap: 'missing_consumption_dimension',
      currentStock: null,
      reorderPoint: null,
    });
  });

  it('keeps stock and units for a product without statistics', () => {
    const row = missingStatisticsRow(product('P1'), dimension('P1'), stock, parameters);

    expect(row).toMatchObject({
      status: 'VERIFY',
      gap: 'missing_demand_statistics',
      targetUnit: 'ML',
      currentStock: 30,
      leadTimeMeanDays: 6,
      demandMean: null,
      coverageDays: null,
    });
  });

  it('reads stock from the target scale', () => {
    expect(targetStockOf(dimension('P1'), stock)).toBe(30);
    expect(targetStockOf(dimension('P1', { consumptionType: 'single_dose' }), stock)).toBe(3);
  });
});

describe('resolveParameters', () => {
  it('falls back to defaults for unset or blank keys', () => {
    expect(resolveParameters({ nivel_servico: '  ' }, parameters)).toEqual(parameters);
  });

  it('reads stored values, accepting a decimal comma', () => {
    expect(
      resolveParameters(
        { nivel_servico: '0,9', mu_t_dias_uteis: '10', sigma_t_dias_uteis: '2.5' },
        parameters
      )
    ).toEqual({ serviceLevel: 0.9, leadTimeMeanDays: 10, leadTimeStdDevDays: 2.5 });
  });

  it('rejects a value that is not a number', () => {
    expect(() => resolveParameters({ mu_t_dias_uteis: 'six' }, parameters)).toThrow(
      'Parameter mu_t_dias_uteis is not a number: "six"'
    );
  });

  it('rejects out-of-range values', () => {
    expect(() => resolveParameters({ nivel_servico: '1' }, parameters)).toThrow(ValidationError);
    expect(() => resolveParameters({ sigma_t_dias_uteis: '-1' }, parameters)).toThrow(
      ValidationError
    );
  });
});

describe('validateParameters', () => {
  it('lists the failing fields', () => {
    try {
      validateParameters({ serviceLevel: 0, leadTimeMeanDays: 6, leadTimeStdDevDays: 1 });
      expect.unreachable('validation should fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.details).toEqual({ serviceLevel: ['Service level must be greater than 0'] });
      }
    }
  });
});

describe('encodeParameters', () => {
  it('writes only the given values under their stored keys', () => {
    expect(encodeParameters({ serviceLevel: 0.9 })).toEqual({ nivel_servico: '0.9' });
  });
});
