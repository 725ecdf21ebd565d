/**
 * @fileoverview Replenishment Service and report tests
 *
 * Runs the full verification over an in-memory store seeded with one
 * product per outcome: replenish, OK, missing statistics, missing
 * dimension and excluded.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '@clinistock/core';
import {
  ReplenishmentService,
  createReplenishmentService,
} from '../replenishment/replenishment-service.js';
import {
  ReplenishmentReportService,
  createReplenishmentReportService,
} from '../replenishment/report-service.js';
import {
  InMemoryReplenishmentStore,
  dimension,
  exit,
  lot,
  product,
  storeDeps,
} from './replenishment-fixtures.js';

// ============================================================================
// TEST DATA
// ============================================================================

function seed(store: InMemoryReplenishmentStore): void {
  store.products = [
    product('P1', { name: 'Lidocaine', lotMinimum: 1, lotMultiple: 1 }),
    product('P2', { name: 'Articaine' }),
    product('P3', { name: 'Gloves' }),
    product('P4', { name: 'Gauze' }),
    product('P5', { name: 'Needles' }),
  ];
  store.dimensions = [
    dimension('P1'),
    dimension('P2', { consumptionType: 'single_dose' }),
    dimension('P3', { consumptionType: 'excluded' }),
    dimension('P5', {
      consumptionType: 'single_dose',
      presentationUnit: 'CX',
      clinicalUnit: 'UN',
      conversionFactor: 100,
    }),
  ];
  store.exits = [
    exit('P1', '2024-03-04', '4 ML - mililitro'),
    exit('P1', '2024-03-05', '0,5 FR - frasco'),
    exit('P1', '2024-03-06', '2 ML'),
    exit('P1', '06/03/2024', '2 ML'),
    exit('P1', '2024-03-07', '3 ML'),
    exit('P1', '2024-03-07', '50 ML', { discarded: true }),
    exit('P3', '2024-03-07', '10 UN'),
    exit('P5', '2024-03-04', '1 CX'),
    exit('P5', '2024-03-05', '1 CX'),
  ];
  store.lots = [
    lot('P1', 'L1', {
      presentationQuantity: 2,
      presentationUnit: 'FR',
      clinicalQuantity: 20,
      clinicalUnit: 'ML',
      expiryDate: '2024-04-10',
    }),
    lot('P1', 'L2', {
      presentationQuantity: 1,
      presentationUnit: 'FR',
      clinicalQuantity: 10,
      clinicalUnit: 'ML',
      expiryDate: '2024-06-30',
    }),
    lot('P2', 'L0', {
      presentationQuantity: 1,
      presentationUnit: 'FR',
      expiryDate: '2024-01-01',
    }),
    lot('P5', 'L1', {
      presentationQuantity: 20,
      presentationUnit: 'CX',
      expiryDate: '10/04/2024',
    }),
    lot('P5', 'L2', { presentationQuantity: 0, presentationUnit: 'CX' }),
  ];
}

// ============================================================================
// REPLENISHMENT SERVICE
// ============================================================================

describe('ReplenishmentService', () => {
  let store: InMemoryReplenishmentStore;
  let service: ReplenishmentService;

  beforeEach(() => {
    store = new InMemoryReplenishmentStore();
    seed(store);
    service = createReplenishmentService(storeDeps(store));
  });

  describe('getParameters', () => {
    it('uses the defaults when nothing is stored', async () => {
      await expect(service.getParameters()).resolves.toEqual({
        serviceLevel: 0.95,
        leadTimeMeanDays: 6,
        leadTimeStdDevDays: 1,
      });
    });

    it('honours configured defaults and stored overrides', async () => {
      store.parameters = { mu_t_dias_uteis: '3' };
      const configured = new ReplenishmentService(storeDeps(store), {
        defaults: { serviceLevel: 0.9, leadTimeMeanDays: 10, leadTimeStdDevDays: 0 },
      });

      await expect(configured.getParameters()).resolves.toEqual({
        serviceLevel: 0.9,
        leadTimeMeanDays: 3,
        leadTimeStdDevDays: 0,
      });
    });
  });

  describe('rebuildDemand', () => {
    it('replaces the stored series with the projection of the exit log', async () => {
      store.daily = [{ date: '2020-01-01', code: 'OLD', unit: 'ML', total: 99 }];

      const result = await service.rebuildDemand();

      expect(store.daily).toEqual([
        { date: '2024-03-04', code: 'P1', unit: 'ML', total: 4 },
        { date: '2024-03-04', code: 'P5', unit: 'CX', total: 1 },
        { date: '2024-03-05', code: 'P1', unit: 'ML', total: 5 },
        { date: '2024-03-05', code: 'P5', unit: 'CX', total: 1 },
        { date: '2024-03-06', code: 'P1', unit: 'ML', total: 4 },
        { date: '2024-03-07', code: 'P1', unit: 'ML', total: 3 },
      ]);
      expect(store.monthly).toEqual([
        { yearMonth: '2024-03', code: 'P1', unit: 'ML', total: 16 },
        { yearMonth: '2024-03', code: 'P5', unit: 'CX', total: 2 },
      ]);
      expect(result.accepted).toBe(7);
      expect(result.skipped.discarded).toBe(1);
      expect(result.skipped.excluded_product).toBe(1);
    });

    it('produces the same state when run twice', async () => {
      await service.rebuildDemand();
      const first = { daily: store.daily, monthly: store.monthly };
      await service.rebuildDemand();

      expect({ daily: store.daily, monthly: store.monthly }).toEqual(first);
      expect(store.replaceDemandCalls).toBe(2);
    });
  });

  describe('consolidatedStock', () => {
    it('returns one row per product, zero when it has no lots', async () => {
      const stock = await service.consolidatedStock();

      expect(stock.map((row) => row.code)).toEqual(['P1', 'P2', 'P3', 'P4', 'P5']);
      expect(stock[0]).toEqual({
        code: 'P1',
        presentationQuantity: 3,
        presentationUnit: 'FR',
        clinicalQuantity: 30,
        clinicalUnit: 'ML',
      });
      expect(stock[3]).toEqual({
        code: 'P4',
        presentationQuantity: 0,
        presentationUnit: null,
        clinicalQuantity: 0,
        clinicalUnit: null,
      });
    });
  });

  describe('demandStatistics', () => {
    it('summarizes the stored daily series', async () => {
      await service.rebuildDemand();
      const statistics = await service.demandStatistics();

      expect(statistics).toHaveLength(2);
      expect(statistics[0]).toMatchObject({ code: 'P1', unit: 'ML', mean: 4, observations: 4 });
      expect(statistics[0]?.stdDev).toBeCloseTo(Math.sqrt(0.5), 12);
      expect(statistics[1]).toEqual({ code: 'P5', unit: 'CX', mean: 1, stdDev: 0, observations: 2 });
    });
  });

  describe('runVerification', () => {
    it('returns one row per non-excluded product in urgency order', async () => {
      const rows = await service.runVerification();

      expect(rows.map((row) => [row.code, row.status])).toEqual([
        ['P1', 'REPLENISH'],
        ['P5', 'OK'],
        ['P2', 'VERIFY'],
        ['P4', 'VERIFY'],
      ]);
    });

    it('computes the replenishment row from the rebuilt demand', async () => {
      const [p1] = await service.runVerification();

      expect(p1).toMatchObject({
        code: 'P1',
        name: 'Lidocaine',
        targetUnit: 'ML',
        currentStock: 30,
        demandMean: 4,
        leadTimeDemandMean: 24,
        suggestedClinicalQuantity: 2,
        suggestedPresentationQuantity: 1,
        coverageDays: 7.5,
      });
      expect(p1?.reorderPoint).toBeCloseTo(31.169751, 5);
    });

    it('flags the data-quality gap on VERIFY rows', async () => {
      const rows = await service.runVerification();

      expect(rows.find((row) => row.code === 'P2')?.gap).toBe('missing_demand_statistics');
      expect(rows.find((row) => row.code === 'P4')?.gap).toBe('missing_consumption_dimension');
    });

    it('rebuilds demand before computing', async () => {
      await service.runVerification();
      expect(store.replaceDemandCalls).toBe(1);
      expect(store.monthly).toHaveLength(2);
    });

    it('fails on malformed stored parameters without touching demand', async () => {
      store.parameters = { nivel_servico: 'high' };

      await expect(service.runVerification()).rejects.toThrow(ValidationError);
      expect(store.replaceDemandCalls).toBe(0);
    });

    it('reacts to the stored service level', async () => {
      store.parameters = { nivel_servico: '0.5' };
      const [p1] = await service.runVerification();

      // z = 0: SS = 0, ROP = 24, stock 30 is above it
      expect(p1?.code).toBe('P1');
      expect(p1?.status).toBe('OK');
      expect(p1?.safetyStock).toBe(0);
    });
  });
});

// ============================================================================
// REPORTS
// ============================================================================

describe('ReplenishmentReportService', () => {
  let store: InMemoryReplenishmentStore;
  let replenishment: ReplenishmentService;
  let reports: ReplenishmentReportService;

  beforeEach(() => {
    store = new InMemoryReplenishmentStore();
    seed(store);
    replenishment = createReplenishmentService(storeDeps(store));
    reports = createReplenishmentReportService({
      replenishment,
      catalog: store,
      ledger: store,
      demand: store,
    });
  });

  describe('ruptureAlert', () => {
    it('excludes products covering more than the horizon', async () => {
      await expect(reports.ruptureAlert(7)).resolves.toEqual([]);
    });

    it('includes coverage equal to the horizon', async () => {
      const alerts = await reports.ruptureAlert(7.5);
      expect(alerts.map((row) => row.code)).toEqual(['P1']);
    });

    it('orders by coverage ascending', async () => {
      const alerts = await reports.ruptureAlert(30);
      expect(alerts.map((row) => [row.code, row.coverageDays])).toEqual([
        ['P1', 7.5],
        ['P5', 20],
      ]);
    });

    it('rejects a negative horizon', async () => {
      await expect(reports.ruptureAlert(-1)).rejects.toThrow(ValidationError);
    });
  });

  describe('expiringLots', () => {
    it('lists lots expiring within the window, expired ones included', async () => {
      const lots = await reports.expiringLots({ windowDays: 30, today: '2024-03-20' });

      expect(lots.map((row) => [row.expiryDate, row.code, row.lot])).toEqual([
        ['2024-01-01', 'P2', 'L0'],
        ['2024-04-10', 'P1', 'L1'],
        ['2024-04-10', 'P5', 'L1'],
      ]);
      expect(lots[1]).toEqual({
        code: 'P1',
        lot: 'L1',
        expiryDate: '2024-04-10',
        presentationQuantity: 2,
        presentationUnit: 'FR',
        clinicalQuantity: 20,
        clinicalUnit: 'ML',
      });
    });

    it('includes a lot expiring on the last day of the window', async () => {
      const lots = await reports.expiringLots({ windowDays: 21, today: '2024-03-20' });
      expect(lots.map((row) => row.lot)).toEqual(['L0', 'L1', 'L1']);

      const shorter = await reports.expiringLots({ windowDays: 20, today: '2024-03-20' });
      expect(shorter.map((row) => row.code)).toEqual(['P2']);
    });

    it('rejects an unparsable reference date', async () => {
      await expect(reports.expiringLots({ today: 'soon' })).rejects.toThrow(ValidationError);
    });
  });

  describe('expiringProducts', () => {
    it('aggregates lots per product with the earliest expiry', async () => {
      const rows = await reports.expiringProducts({ windowDays: 120, today: '2024-03-20' });

      expect(rows).toEqual([
        {
          code: 'P2',
          earliestExpiry: '2024-01-01',
          lotCount: 1,
          presentationQuantity: 1,
          presentationUnit: 'FR',
          clinicalQuantity: 0,
          clinicalUnit: null,
        },
        {
          code: 'P1',
          earliestExpiry: '2024-04-10',
          lotCount: 2,
          presentationQuantity: 3,
          presentationUnit: 'FR',
          clinicalQuantity: 30,
          clinicalUnit: 'ML',
        },
        {
          code: 'P5',
          earliestExpiry: '2024-04-10',
          lotCount: 1,
          presentationQuantity: 20,
          presentationUnit: 'CX',
          clinicalQuantity: 0,
          clinicalUnit: null,
        },
      ]);
    });
  });

  describe('topConsumption', () => {
    beforeEach(async () => {
      await replenishment.rebuildDemand();
    });

    it('ranks products by total demand in the range', async () => {
      await expect(reports.topConsumption('2024-01', '2024-03')).resolves.toEqual([
        { code: 'P1', name: 'Lidocaine', total: 16 },
        { code: 'P5', name: 'Needles', total: 2 },
      ]);
    });

    it('honours the limit', async () => {
      const top = await reports.topConsumption('2024-03', '2024-03', 1);
      expect(top.map((row) => row.code)).toEqual(['P1']);
    });

    it('is empty outside the recorded months', async () => {
      await expect(reports.topConsumption('2024-04', '2024-12')).resolves.toEqual([]);
    });

    it('rejects a malformed month', async () => {
      await expect(reports.topConsumption('2024-3', '2024-04')).rejects.toThrow(
        'from must use YYYY-MM'
      );
    });
  });

  describe('replenishmentList', () => {
    it('keeps only CRITICAL and REPLENISH rows', async () => {
      const rows = await reports.replenishmentList();
      expect(rows.map((row) => [row.code, row.status])).toEqual([['P1', 'REPLENISH']]);
    });

    it('puts critical products first, then the larger shortfall', async () => {
      store.lots = [];
      const rows = await reports.replenishmentList();

      // Without stock: P1 needs ~31.17 ML, P5 needs ~7.64 CX
      expect(rows.map((row) => [row.code, row.status])).toEqual([
        ['P1', 'CRITICAL'],
        ['P5', 'CRITICAL'],
      ]);
    });
  });
});
