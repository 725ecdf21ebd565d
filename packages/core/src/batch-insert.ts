/**
 * Batch Insert Utilities
 *
 * Multi-row parameterized INSERT with automatic chunking, run on a client
 * the caller provides (usually a transaction client, so that every chunk
 * commits or rolls back together).
 *
 * @module batch-insert
 */

import type { DatabaseClient } from './database.js';
import { createLogger } from './logger.js';

const logger = createLogger({ name: 'batch-insert' });

/**
 * PostgreSQL accepts at most 65535 bind parameters per statement
 */
const MAX_PARAMETERS = 65535;

export type ConflictClause =
  | { readonly columns: readonly string[]; readonly action: 'DO NOTHING' }
  | {
      readonly columns: readonly string[];
      readonly action: 'DO UPDATE';
      /** Without any, the clause degrades to DO NOTHING */
      readonly updateColumns?: readonly string[];
    };

export interface BatchInsertOptions<T> {
  table: string;
  columns: readonly string[];
  /** Values of one item, in column order */
  getValues: (item: T) => unknown[];
  /** Items per statement (default 500, lowered to fit the parameter limit) */
  chunkSize?: number;
  onConflict?: ConflictClause;
}

function conflictSql(clause: ConflictClause): string {
  const target = `ON CONFLICT (${clause.columns.join(', ')})`;
  const updates = clause.action === 'DO UPDATE' ? (clause.updateColumns ?? []) : [];
  if (updates.length === 0) return `${target} DO NOTHING`;
  return `${target} DO UPDATE SET ${updates.map((col) => `${col} = EXCLUDED.${col}`).join(', ')}`;
}

/**
 * Multi-row INSERT with `$n` placeholders numbered row by row
 */
export function buildInsertQuery(
  table: string,
  columns: readonly string[],
  rowCount: number,
  onConflict?: ConflictClause
): string {
  const width = columns.length;
  const rows = Array.from({ length: rowCount }, (_, row) => {
    const params = Array.from({ length: width }, (_, col) => `$${row * width + col + 1}`);
    return `(${params.join(', ')})`;
  });

  const insert = `INSERT INTO ${table} (${columns.join(', ')}) VALUES ${rows.join(', ')}`;
  return onConflict ? `${insert} ${conflictSql(onConflict)}` : insert;
}

/**
 * Insert `items` in chunks on the given client
 *
 * @returns Rows reported written by the database
 *
 * @example
 * ```typescript
 * await withTransaction(db, (tx) =>
 *   batchInsert(tx, rows, {
 *     table: 'demanda_diaria',
 *     columns: ['data', 'codigo', 'unidade', 'qtd_total'],
 *     getValues: (row) => [row.date, row.code, row.unit, row.total],
 *   })
 * );
 * ```
 */
export async function batchInsert<T>(
  client: DatabaseClient,
  items: readonly T[],
  options: BatchInsertOptions<T>
): Promise<number> {
  const { table, columns, getValues, onConflict } = options;
  if (items.length === 0) return 0;

  const chunkSize = Math.max(
    1,
    Math.min(options.chunkSize ?? 500, Math.floor(MAX_PARAMETERS / columns.length))
  );
  const totalBatches = Math.ceil(items.length / chunkSize);

  let written = 0;
  for (let offset = 0; offset < items.length; offset += chunkSize) {
    const batch = items.slice(offset, offset + chunkSize);
    const query = buildInsertQuery(table, columns, batch.length, onConflict);

    try {
      const result = await client.query(query, batch.flatMap(getValues));
      written += result.rowCount ?? batch.length;
    } catch (error) {
      logger.error(
        { err: error, table, batchNumber: offset / chunkSize + 1, totalBatches },
        'Batch insert chunk failed'
      );
      throw error;
    }
  }

  logger.debug({ table, rows: written, batches: totalBatches }, 'Batch insert completed');
  return written;
}
