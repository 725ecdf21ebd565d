/**
 * @fileoverview In-Memory Replenishment Repository (Infrastructure Layer)
 *
 * One in-memory adapter for every replenishment port: catalog, stock
 * ledger, demand and parameters. Suitable for development and testing.
 *
 * @module @clinistock/infrastructure/repositories/in-memory-replenishment-repository
 */

import { createLogger } from '@clinistock/core';
import type {
  ICatalogRepository,
  IDemandRepository,
  IParameterStore,
  IStockLedgerRepository,
} from '@clinistock/domain';
import type {
  ConsumptionDimension,
  DailyDemand,
  EntryRecord,
  ExitRecord,
  LotSnapshot,
  MonthlyDemand,
  Product,
} from '@clinistock/types';

const logger = createLogger({ name: 'in-memory-replenishment-repository' });

function byCode(a: { code: string }, b: { code: string }): number {
  if (a.code === b.code) return 0;
  return a.code < b.code ? -1 : 1;
}

function lotKey(lot: Pick<LotSnapshot, 'code' | 'lot'>): string {
  return `${lot.code}\u0000${lot.lot}`;
}

export interface InMemoryReplenishmentSeed {
  products?: readonly Product[];
  dimensions?: readonly ConsumptionDimension[];
  exits?: readonly ExitRecord[];
  lots?: readonly LotSnapshot[];
  parameters?: Readonly<Record<string, string>>;
}

/**
 * In-memory implementation of the replenishment ports
 */
export class InMemoryReplenishmentRepository
  implements ICatalogRepository, IStockLedgerRepository, IDemandRepository, IParameterStore
{
  private products = new Map<string, Product>();
  private dimensions = new Map<string, ConsumptionDimension>();
  private entries: EntryRecord[] = [];
  private exits: ExitRecord[] = [];
  private lots = new Map<string, LotSnapshot>();
  private daily: DailyDemand[] = [];
  private monthly: MonthlyDemand[] = [];
  private parameters = new Map<string, string>();

  constructor(seed: InMemoryReplenishmentSeed = {}) {
    for (const product of seed.products ?? []) this.products.set(product.code, product);
    for (const dimension of seed.dimensions ?? []) this.dimensions.set(dimension.code, dimension);
    this.exits = [...(seed.exits ?? [])];
    for (const lot of seed.lots ?? []) this.lots.set(lotKey(lot), lot);
    for (const [key, value] of Object.entries(seed.parameters ?? {})) {
      this.parameters.set(key, value);
    }

    logger.info(
      { products: this.products.size, exits: this.exits.length, lots: this.lots.size },
      'InMemoryReplenishmentRepository initialized'
    );
  }

  // ============================================================================
  // Catalog
  // ============================================================================

  async getProducts(): Promise<Product[]> {
    return [...this.products.values()].sort(byCode);
  }

  async getProduct(code: string): Promise<Product | null> {
    return this.products.get(code) ?? null;
  }

  async getDimensions(): Promise<ConsumptionDimension[]> {
    return [...this.dimensions.values()].sort(byCode);
  }

  async upsertProducts(products: readonly Product[]): Promise<number> {
    for (const product of products) this.products.set(product.code, product);
    return products.length;
  }

  async upsertDimensions(dimensions: readonly ConsumptionDimension[]): Promise<number> {
    for (const dimension of dimensions) this.dimensions.set(dimension.code, dimension);
    return dimensions.length;
  }

  // ============================================================================
  // Stock ledger
  // ============================================================================

  async insertEntry(entry: EntryRecord): Promise<void> {
    this.entries.push(entry);
  }

  async insertExit(exit: ExitRecord): Promise<void> {
    this.exits.push(exit);
  }

  async getExits(): Promise<ExitRecord[]> {
    return [...this.exits];
  }

  /**
   * Recorded entries, oldest first
   */
  async getEntries(): Promise<EntryRecord[]> {
    return [...this.entries];
  }

  async getLots(): Promise<LotSnapshot[]> {
    return [...this.lots.values()].sort(
      (a, b) => byCode(a, b) || (a.lot === b.lot ? 0 : a.lot < b.lot ? -1 : 1)
    );
  }

  async upsertLots(lots: readonly LotSnapshot[]): Promise<number> {
    for (const lot of lots) this.lots.set(lotKey(lot), lot);
    return lots.length;
  }

  async replaceLots(lots: readonly LotSnapshot[]): Promise<number> {
    this.lots.clear();
    return this.upsertLots(lots);
  }

  // ============================================================================
  // Demand
  // ============================================================================

  async replaceDemand(
    daily: readonly DailyDemand[],
    monthly: readonly MonthlyDemand[]
  ): Promise<void> {
    this.daily = [...daily];
    this.monthly = [...monthly];
  }

  async getDailyDemand(): Promise<DailyDemand[]> {
    return [...this.daily];
  }

  async getMonthlyDemand(): Promise<MonthlyDemand[]> {
    return [...this.monthly];
  }

  // ============================================================================
  // Parameters
  // ============================================================================

  async getRawParameters(): Promise<Record<string, string>> {
    return Object.fromEntries(this.parameters);
  }

  async setRawParameters(values: Record<string, string>): Promise<void> {
    for (const [key, value] of Object.entries(values)) this.parameters.set(key, value);
  }
}

export function createInMemoryReplenishmentRepository(
  seed?: InMemoryReplenishmentSeed
): InMemoryReplenishmentRepository {
  return new InMemoryReplenishmentRepository(seed);
}
