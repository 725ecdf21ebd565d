/**
 * @fileoverview InMemoryReplenishmentRepository Tests
 *
 * @module infrastructure/__tests__/repositories/InMemoryReplenishmentRepository
 */

import { describe, it, expect } from 'vitest';
import { createReplenishmentService } from '@clinistock/domain';
import type { LotSnapshot, Product } from '@clinistock/types';
import { createInMemoryReplenishmentRepository } from '../../src/repositories/index.js';

function product(code: string): Product {
  return {
    code,
    name: code,
    category: null,
    lotTracking: false,
    expiryTracking: false,
    lotMinimum: null,
    lotMultiple: null,
    minimumQuantity: null,
  };
}

function lot(code: string, lotNumber: string, quantity: number): LotSnapshot {
  return {
    code,
    lot: lotNumber,
    presentationQuantityRaw: `${quantity} CX`,
    clinicalQuantityRaw: null,
    entryDate: null,
    expiryDate: null,
    presentationQuantity: quantity,
    presentationUnit: 'CX',
    clinicalQuantity: null,
    clinicalUnit: null,
  };
}

describe('InMemoryReplenishmentRepository', () => {
  it('returns products ordered by code', async () => {
    const repository = createInMemoryReplenishmentRepository({
      products: [product('B'), product('A')],
    });

    const products = await repository.getProducts();
    expect(products.map((p) => p.code)).toEqual(['A', 'B']);
  });

  it('upserts lots by product and lot number', async () => {
    const repository = createInMemoryReplenishmentRepository({ lots: [lot('A', 'L1', 1)] });

    await repository.upsertLots([lot('A', 'L1', 5), lot('A', 'L2', 2)]);

    const lots = await repository.getLots();
    expect(lots.map((l) => [l.lot, l.presentationQuantity])).toEqual([
      ['L1', 5],
      ['L2', 2],
    ]);
  });

  it('replaces the snapshot wholesale', async () => {
    const repository = createInMemoryReplenishmentRepository({ lots: [lot('A', 'L1', 1)] });

    await repository.replaceLots([lot('B', 'L9', 3)]);

    const lots = await repository.getLots();
    expect(lots.map((l) => `${l.code}/${l.lot}`)).toEqual(['B/L9']);
  });

  it('merges stored parameters', async () => {
    const repository = createInMemoryReplenishmentRepository({
      parameters: { nivel_servico: '0.9' },
    });

    await repository.setRawParameters({ mu_t_dias_uteis: '4' });

    await expect(repository.getRawParameters()).resolves.toEqual({
      nivel_servico: '0.9',
      mu_t_dias_uteis: '4',
    });
  });

  it('backs a full verification run', async () => {
    const repository = createInMemoryReplenishmentRepository({
      products: [product('A')],
      dimensions: [
        {
          code: 'A',
          consumptionType: 'single_dose',
          presentationUnit: 'CX',
          clinicalUnit: null,
          conversionFactor: null,
          administrationRoute: null,
          notes: null,
        },
      ],
      exits: [
        {
          date: '2024-03-04',
          code: 'A',
          rawQuantity: '2 CX',
          lot: null,
          expiryDate: null,
          cost: null,
          patient: null,
          responsible: null,
          discarded: false,
        },
      ],
      lots: [lot('A', 'L1', 100)],
    });
    const service = createReplenishmentService({
      catalog: repository,
      ledger: repository,
      demand: repository,
      parameters: repository,
    });

    const [row] = await service.runVerification();

    // mean 2, no demand variance; sigma_DL = 2 * 1 = 2
    expect(row).toMatchObject({ code: 'A', status: 'OK', demandMean: 2, leadTimeDemandMean: 12 });
    expect(row?.leadTimeDemandStdDev).toBe(2);
    await expect(repository.getMonthlyDemand()).resolves.toEqual([
      { yearMonth: '2024-03', code: 'A', unit: 'CX', total: 2 },
    ]);
  });
});
