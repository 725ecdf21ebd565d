/**
 * @fileoverview PostgreSQL Parameter Store (Infrastructure Layer)
 *
 * Global replenishment parameters in the `params` key/value table.
 *
 * @module @clinistock/infrastructure/repositories/postgres-parameter-store
 */

import {
  batchInsert,
  createLogger,
  toDatabaseError,
  withTransaction,
  type DatabasePool,
} from '@clinistock/core';
import type { IParameterStore } from '@clinistock/domain';

const logger = createLogger({ name: 'postgres-parameter-store' });

interface ParameterRow {
  chave: string;
  valor: string | null;
}

export class PostgresParameterStore implements IParameterStore {
  constructor(private readonly pool: DatabasePool) {}

  async getRawParameters(): Promise<Record<string, string>> {
    try {
      const result = await this.pool.query<ParameterRow>('SELECT chave, valor FROM params');
      const parameters: Record<string, string> = {};
      for (const row of result.rows) {
        if (row.valor !== null) parameters[row.chave] = row.valor;
      }
      return parameters;
    } catch (error) {
      logger.error({ err: error }, 'Failed to load parameters');
      throw toDatabaseError('getRawParameters', error);
    }
  }

  async setRawParameters(values: Record<string, string>): Promise<void> {
    const entries = Object.entries(values);
    if (entries.length === 0) return;

    try {
      await withTransaction(this.pool, (tx) =>
        batchInsert(tx, entries, {
          table: 'params',
          columns: ['chave', 'valor'],
          getValues: ([key, value]) => [key, value],
          onConflict: { columns: ['chave'], action: 'DO UPDATE', updateColumns: ['valor'] },
        })
      );
    } catch (error) {
      logger.error({ err: error, keys: entries.map(([key]) => key) }, 'Failed to store parameters');
      throw toDatabaseError('setRawParameters', error);
    }
  }
}

export function createPostgresParameterStore(pool: DatabasePool): PostgresParameterStore {
  return new PostgresParameterStore(pool);
}
