/**
 * @fileoverview PostgreSQL Demand Repository (Infrastructure Layer)
 *
 * Derived daily (`demanda_diaria`) and monthly (`demanda_mensal`) demand.
 * A replacement deletes and reloads both tables in one transaction under
 * an advisory lock, so concurrent rebuilds run one after the other and
 * readers see either the old series or the new one.
 *
 * @module @clinistock/infrastructure/repositories/postgres-demand-repository
 */

import {
  batchInsert,
  createLogger,
  stringToLockKey,
  toDatabaseError,
  withAdvisoryLock,
  withTransaction,
  type DatabasePool,
} from '@clinistock/core';
import type { IDemandRepository } from '@clinistock/domain';
import type { DailyDemand, MonthlyDemand } from '@clinistock/types';
import { numberOrNull } from './postgres-mappers.js';

const logger = createLogger({ name: 'postgres-demand-repository' });

export const DEMAND_REBUILD_LOCK = 'clinistock:demand-rebuild';

interface DailyDemandRow {
  data: string;
  codigo: string;
  unidade: string;
  qtd_total: string | number | null;
}

interface MonthlyDemandRow {
  ano_mes: string;
  codigo: string;
  unidade: string;
  qtd_total: string | number | null;
}

export class PostgresDemandRepository implements IDemandRepository {
  private readonly lockKey = stringToLockKey(DEMAND_REBUILD_LOCK);

  constructor(private readonly pool: DatabasePool) {}

  async replaceDemand(
    daily: readonly DailyDemand[],
    monthly: readonly MonthlyDemand[]
  ): Promise<void> {
    try {
      await withAdvisoryLock(this.pool, this.lockKey, () =>
        withTransaction(this.pool, async (tx) => {
          await tx.query('DELETE FROM demanda_diaria');
          await tx.query('DELETE FROM demanda_mensal');

          await batchInsert(tx, daily, {
            table: 'demanda_diaria',
            columns: ['data', 'codigo', 'unidade', 'qtd_total'],
            getValues: (row) => [row.date, row.code, row.unit, row.total],
          });
          await batchInsert(tx, monthly, {
            table: 'demanda_mensal',
            columns: ['ano_mes', 'codigo', 'unidade', 'qtd_total'],
            getValues: (row) => [row.yearMonth, row.code, row.unit, row.total],
          });
        })
      );

      logger.info({ daily: daily.length, monthly: monthly.length }, 'Demand series replaced');
    } catch (error) {
      logger.error({ err: error }, 'Failed to replace demand series');
      throw toDatabaseError('replaceDemand', error);
    }
  }

  async getDailyDemand(): Promise<DailyDemand[]> {
    try {
      const result = await this.pool.query<DailyDemandRow>(
        'SELECT data, codigo, unidade, qtd_total FROM demanda_diaria ORDER BY data, codigo, unidade'
      );
      return result.rows.map((row) => ({
        date: row.data,
        code: row.codigo,
        unit: row.unidade,
        total: numberOrNull(row.qtd_total) ?? 0,
      }));
    } catch (error) {
      logger.error({ err: error }, 'Failed to load daily demand');
      throw toDatabaseError('getDailyDemand', error);
    }
  }

  async getMonthlyDemand(): Promise<MonthlyDemand[]> {
    try {
      const result = await this.pool.query<MonthlyDemandRow>(
        'SELECT ano_mes, codigo, unidade, qtd_total FROM demanda_mensal ORDER BY ano_mes, codigo, unidade'
      );
      return result.rows.map((row) => ({
        yearMonth: row.ano_mes,
        code: row.codigo,
        unit: row.unidade,
        total: numberOrNull(row.qtd_total) ?? 0,
      }));
    } catch (error) {
      logger.error({ err: error }, 'Failed to load monthly demand');
      throw toDatabaseError('getMonthlyDemand', error);
    }
  }
}

export function createPostgresDemandRepository(pool: DatabasePool): PostgresDemandRepository {
  return new PostgresDemandRepository(pool);
}
