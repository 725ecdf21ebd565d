/**
 * @fileoverview PostgreSQL Stock Ledger Repository (Infrastructure Layer)
 *
 * Append-only entry (`entrada`) and exit (`saida`) logs plus the per-lot
 * stock snapshot (`estoque_lote_snapshot`), which keeps the raw quantity
 * text next to its parsed numeric and unit columns.
 *
 * @module @clinistock/infrastructure/repositories/postgres-stock-ledger-repository
 */

import {
  batchInsert,
  createLogger,
  toDatabaseError,
  withTransaction,
  type DatabasePool,
} from '@clinistock/core';
import type { IStockLedgerRepository } from '@clinistock/domain';
import type { EntryRecord, ExitRecord, LotSnapshot } from '@clinistock/types';
import { numberOrNull, textOrNull } from './postgres-mappers.js';

const logger = createLogger({ name: 'postgres-stock-ledger-repository' });

// ============================================================================
// DATABASE ROW TYPES
// ============================================================================

interface ExitRow {
  data_saida: string | null;
  codigo: string;
  quantidade_raw: string | null;
  lote: string | null;
  data_validade: string | null;
  custo: string | number | null;
  paciente: string | null;
  responsavel: string | null;
  descarte_flag: boolean | null;
}

interface LotRow {
  codigo: string;
  lote: string;
  qtd_apresentacao_raw: string | null;
  qtd_unidade_raw: string | null;
  data_entrada: string | null;
  data_validade: string | null;
  qtd_apres_num: string | number | null;
  qtd_apres_un: string | null;
  qtd_unid_num: string | number | null;
  qtd_unid_un: string | null;
}

const LOT_COLUMNS = [
  'codigo',
  'lote',
  'qtd_apresentacao_raw',
  'qtd_unidade_raw',
  'data_entrada',
  'data_validade',
  'qtd_apres_num',
  'qtd_apres_un',
  'qtd_unid_num',
  'qtd_unid_un',
] as const;

function lotValues(lot: LotSnapshot): unknown[] {
  return [
    lot.code,
    lot.lot,
    lot.presentationQuantityRaw,
    lot.clinicalQuantityRaw,
    lot.entryDate,
    lot.expiryDate,
    lot.presentationQuantity,
    lot.presentationUnit,
    lot.clinicalQuantity,
    lot.clinicalUnit,
  ];
}

// ============================================================================
// REPOSITORY IMPLEMENTATION
// ============================================================================

export class PostgresStockLedgerRepository implements IStockLedgerRepository {
  constructor(private readonly pool: DatabasePool) {}

  // ============================================================================
  // TRANSACTION LOGS
  // ============================================================================

  async insertEntry(entry: EntryRecord): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO entrada (
          data_entrada, codigo, quantidade_raw, lote, data_validade,
          valor_unitario, nota_fiscal, representante, responsavel, pago
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
        [
          entry.date,
          entry.code,
          entry.rawQuantity,
          entry.lot,
          entry.expiryDate,
          entry.unitPrice,
          entry.invoiceNumber,
          entry.representative,
          entry.responsible,
          entry.paid,
        ]
      );
    } catch (error) {
      logger.error({ err: error, code: entry.code }, 'Failed to insert entry');
      throw toDatabaseError('insertEntry', error);
    }
  }

  async insertExit(exit: ExitRecord): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO saida (
          data_saida, codigo, quantidade_raw, lote, data_validade,
          custo, paciente, responsavel, descarte_flag
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
        [
          exit.date,
          exit.code,
          exit.rawQuantity,
          exit.lot,
          exit.expiryDate,
          exit.cost,
          exit.patient,
          exit.responsible,
          exit.discarded,
        ]
      );
    } catch (error) {
      logger.error({ err: error, code: exit.code }, 'Failed to insert exit');
      throw toDatabaseError('insertExit', error);
    }
  }

  async getExits(): Promise<ExitRecord[]> {
    try {
      const result = await this.pool.query<ExitRow>(
        `SELECT data_saida, codigo, quantidade_raw, lote, data_validade,
                custo, paciente, responsavel, descarte_flag
         FROM saida
         ORDER BY id`
      );
      return result.rows.map((row) => this.rowToExit(row));
    } catch (error) {
      logger.error({ err: error }, 'Failed to load exits');
      throw toDatabaseError('getExits', error);
    }
  }

  // ============================================================================
  // LOT SNAPSHOT
  // ============================================================================

  async getLots(): Promise<LotSnapshot[]> {
    try {
      const result = await this.pool.query<LotRow>(
        `SELECT ${LOT_COLUMNS.join(', ')} FROM estoque_lote_snapshot ORDER BY codigo, lote`
      );
      return result.rows.map((row) => this.rowToLot(row));
    } catch (error) {
      logger.error({ err: error }, 'Failed to load lot snapshot');
      throw toDatabaseError('getLots', error);
    }
  }

  async upsertLots(lots: readonly LotSnapshot[]): Promise<number> {
    try {
      return await withTransaction(this.pool, (tx) =>
        batchInsert(tx, lots, {
          table: 'estoque_lote_snapshot',
          columns: LOT_COLUMNS,
          getValues: lotValues,
          onConflict: {
            columns: ['codigo', 'lote'],
            action: 'DO UPDATE',
            updateColumns: LOT_COLUMNS.slice(2),
          },
        })
      );
    } catch (error) {
      logger.error({ err: error, count: lots.length }, 'Failed to upsert lots');
      throw toDatabaseError('upsertLots', error);
    }
  }

  async replaceLots(lots: readonly LotSnapshot[]): Promise<number> {
    try {
      return await withTransaction(this.pool, async (tx) => {
        await tx.query('DELETE FROM estoque_lote_snapshot');
        return batchInsert(tx, lots, {
          table: 'estoque_lote_snapshot',
          columns: LOT_COLUMNS,
          getValues: lotValues,
        });
      });
    } catch (error) {
      logger.error({ err: error, count: lots.length }, 'Failed to replace lot snapshot');
      throw toDatabaseError('replaceLots', error);
    }
  }

  // ============================================================================
  // MAPPERS
  // ============================================================================

  private rowToExit(row: ExitRow): ExitRecord {
    return {
      date: row.data_saida ?? '',
      code: row.codigo,
      rawQuantity: row.quantidade_raw ?? '',
      lot: textOrNull(row.lote),
      expiryDate: textOrNull(row.data_validade),
      cost: numberOrNull(row.custo),
      patient: textOrNull(row.paciente),
      responsible: textOrNull(row.responsavel),
      discarded: row.descarte_flag ?? false,
    };
  }

  private rowToLot(row: LotRow): LotSnapshot {
    return {
      code: row.codigo,
      lot: row.lote,
      presentationQuantityRaw: textOrNull(row.qtd_apresentacao_raw),
      clinicalQuantityRaw: textOrNull(row.qtd_unidade_raw),
      entryDate: textOrNull(row.data_entrada),
      expiryDate: textOrNull(row.data_validade),
      presentationQuantity: numberOrNull(row.qtd_apres_num),
      presentationUnit: textOrNull(row.qtd_apres_un),
      clinicalQuantity: numberOrNull(row.qtd_unid_num),
      clinicalUnit: textOrNull(row.qtd_unid_un),
    };
  }
}

export function createPostgresStockLedgerRepository(
  pool: DatabasePool
): PostgresStockLedgerRepository {
  return new PostgresStockLedgerRepository(pool);
}
