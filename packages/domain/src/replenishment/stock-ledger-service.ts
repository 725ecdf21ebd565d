/**
 * @fileoverview Stock Ledger Service
 *
 * Records entries and exits in the append-only logs and registers lots in
 * the stock snapshot, parsing their free-text quantities into numeric and
 * unit columns for both scales.
 *
 * @module domain/replenishment/stock-ledger-service
 */

import { NotFoundError, ValidationError, createLogger, parseDate, parseQuantityText } from '@clinistock/core';
import {
  EntryRecordSchema,
  ExitRecordSchema,
  LotRegistrationSchema,
  Option,
  type EntryRecord,
  type ExitRecord,
  type LotRegistration,
  type LotSnapshot,
} from '@clinistock/types';
import type {
  ICatalogRepository,
  IStockLedgerRepository,
  StockLedgerServiceDeps,
} from './interfaces.js';
import { duplicateKeys, parseInput } from './validation.js';

const logger = createLogger({ name: 'stock-ledger-service' });

/**
 * ISO form of a date when it parses, otherwise the text as given
 */
function normalizeDateText(raw: string | null): string | null {
  if (raw === null) return null;
  return Option.unwrapOr(parseDate(raw), raw);
}

/**
 * Build the snapshot row for a registered lot
 */
export function toLotSnapshot(registration: LotRegistration): LotSnapshot {
  const presentation = parseQuantityText(registration.presentationQuantityRaw);
  const clinical = parseQuantityText(registration.clinicalQuantityRaw);

  return {
    code: registration.code,
    lot: registration.lot,
    presentationQuantityRaw: registration.presentationQuantityRaw,
    clinicalQuantityRaw: registration.clinicalQuantityRaw,
    entryDate: normalizeDateText(registration.entryDate),
    expiryDate: normalizeDateText(registration.expiryDate),
    presentationQuantity: presentation.amount,
    presentationUnit: presentation.unit,
    clinicalQuantity: clinical.amount,
    clinicalUnit: clinical.unit,
  };
}

export interface RegisterLotsOptions {
  /** Clear the snapshot before loading (full reload) */
  readonly replace?: boolean;
}

export class StockLedgerService {
  private readonly catalog: ICatalogRepository;
  private readonly ledger: IStockLedgerRepository;

  constructor(deps: StockLedgerServiceDeps) {
    this.catalog = deps.catalog;
    this.ledger = deps.ledger;
  }

  async recordEntry(input: unknown): Promise<EntryRecord> {
    const entry = parseInput(EntryRecordSchema, input, 'entry');
    await this.requireProduct(entry.code);
    await this.ledger.insertEntry(entry);

    logger.info({ code: entry.code, lot: entry.lot }, 'Entry recorded');
    return entry;
  }

  async recordExit(input: unknown): Promise<ExitRecord> {
    const exit = parseInput(ExitRecordSchema, input, 'exit');
    await this.requireProduct(exit.code);
    await this.ledger.insertExit(exit);

    logger.info({ code: exit.code, discarded: exit.discarded }, 'Exit recorded');
    return exit;
  }

  /**
   * Register lots in the stock snapshot, one row per (code, lot)
   *
   * @returns Number of lots written
   */
  async registerLots(inputs: readonly unknown[], options: RegisterLotsOptions = {}): Promise<number> {
    const registrations = inputs.map((input, index) =>
      parseInput(LotRegistrationSchema, input, `lot at index ${index}`)
    );

    const duplicates = duplicateKeys(registrations.map((lot) => `${lot.code}/${lot.lot}`));
    if (duplicates.length > 0) {
      throw new ValidationError('Duplicate lots', { lots: duplicates });
    }

    const products = await this.catalog.getProducts();
    const known = new Set(products.map((product) => product.code));
    const unknown = [...new Set(registrations.map((lot) => lot.code))].filter(
      (code) => !known.has(code)
    );
    if (unknown.length > 0) {
      throw new NotFoundError(`Product ${unknown.join(', ')}`);
    }

    const snapshots = registrations.map(toLotSnapshot);
    const written = options.replace
      ? await this.ledger.replaceLots(snapshots)
      : await this.ledger.upsertLots(snapshots);

    logger.info({ lots: written, replace: Boolean(options.replace) }, 'Lots registered');
    return written;
  }

  private async requireProduct(code: string): Promise<void> {
    const product = await this.catalog.getProduct(code);
    if (!product) {
      throw new NotFoundError(`Product ${code}`);
    }
  }
}

export function createStockLedgerService(deps: StockLedgerServiceDeps): StockLedgerService {
  return new StockLedgerService(deps);
}
