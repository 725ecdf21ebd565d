/**
 * Database Migration Runner
 *
 * - Idempotent: applied migrations are tracked in schema_migrations
 * - Atomic: each migration runs in its own transaction
 * - Ordered: migrations are applied by filename sort order
 * - Checksummed: an applied file whose content changed is reported, never re-run
 */

import crypto from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import {
  createLogger,
  toDatabaseError,
  withTransaction,
  type DatabasePool,
} from '@clinistock/core';

const logger = createLogger({ name: 'migrations' });

export interface MigrationFile {
  filename: string;
  sql: string;
  checksum: string;
}

interface MigrationRecord {
  filename: string;
  checksum: string | null;
  applied_at: Date | string;
}

export interface MigrationReport {
  applied: string[];
  skipped: string[];
  /** Applied files whose checksum no longer matches */
  modified: string[];
}

export type MigrationState = 'applied' | 'pending' | 'modified';

export interface MigrationStatusRow {
  filename: string;
  state: MigrationState;
  appliedAt: string | null;
}

export const CREATE_MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    id SERIAL PRIMARY KEY,
    filename TEXT NOT NULL UNIQUE,
    checksum VARCHAR(64),
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    applied_by VARCHAR(100) DEFAULT current_user,
    execution_time_ms INTEGER
  )
`;

export function computeChecksum(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex').substring(0, 16);
}

/**
 * Load every .sql file in `directory`, sorted by filename
 */
export async function readMigrationFiles(directory: string): Promise<MigrationFile[]> {
  const filenames = (await readdir(directory)).filter((name) => name.endsWith('.sql')).sort();

  return Promise.all(
    filenames.map(async (filename) => {
      const sql = await readFile(path.join(directory, filename), 'utf8');
      return { filename, sql, checksum: computeChecksum(sql) };
    })
  );
}

async function loadApplied(pool: DatabasePool): Promise<Map<string, MigrationRecord>> {
  await pool.query(CREATE_MIGRATIONS_TABLE);
  const result = await pool.query<MigrationRecord>(
    'SELECT filename, checksum, applied_at FROM schema_migrations ORDER BY filename'
  );
  return new Map(result.rows.map((row) => [row.filename, row]));
}

/**
 * Apply every pending migration in order, stopping at the first failure
 *
 * @throws DatabaseOperationError naming the failed file
 */
export async function runMigrations(
  pool: DatabasePool,
  files: readonly MigrationFile[]
): Promise<MigrationReport> {
  const applied = await loadApplied(pool);
  const report: MigrationReport = { applied: [], skipped: [], modified: [] };

  for (const file of files) {
    const record = applied.get(file.filename);
    if (record) {
      if (record.checksum !== null && record.checksum !== file.checksum) {
        logger.warn({ filename: file.filename }, 'Applied migration has changed since it ran');
        report.modified.push(file.filename);
      }
      report.skipped.push(file.filename);
      continue;
    }

    const startedAt = Date.now();
    try {
      await withTransaction(pool, async (tx) => {
        await tx.query(file.sql);
        await tx.query(
          `INSERT INTO schema_migrations (filename, checksum, execution_time_ms)
           VALUES ($1, $2, $3)`,
          [file.filename, file.checksum, Date.now() - startedAt]
        );
      });
    } catch (error) {
      logger.error({ err: error, filename: file.filename }, 'Migration failed');
      throw toDatabaseError(`migration ${file.filename}`, error);
    }

    logger.info(
      { filename: file.filename, durationMs: Date.now() - startedAt },
      'Migration applied'
    );
    report.applied.push(file.filename);
  }

  return report;
}

/**
 * State of every migration file against the ledger
 */
export async function getMigrationStatus(
  pool: DatabasePool,
  files: readonly MigrationFile[]
): Promise<MigrationStatusRow[]> {
  const applied = await loadApplied(pool);

  return files.map((file) => {
    const record = applied.get(file.filename);
    if (!record) return { filename: file.filename, state: 'pending', appliedAt: null };

    const appliedAt =
      record.applied_at instanceof Date ? record.applied_at.toISOString() : record.applied_at;
    const state: MigrationState =
      record.checksum !== null && record.checksum !== file.checksum ? 'modified' : 'applied';
    return { filename: file.filename, state, appliedAt };
  });
}
