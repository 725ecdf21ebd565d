/**
 * Apply pending migrations from infra/migrations
 *
 * Usage: DATABASE_URL=postgres://... tsx tools/run-migrations.ts
 */

import { fileURLToPath } from 'node:url';
import { closeDatabasePool, createDatabaseClient, createLogger, validateEnv } from '@clinistock/core';
import { readMigrationFiles, runMigrations } from './migrations/migrator.js';

const logger = createLogger({ name: 'run-migrations' });

const MIGRATIONS_DIR = fileURLToPath(new URL('../infra/migrations', import.meta.url));

async function main(): Promise<void> {
  const env = validateEnv();
  if (!env.DATABASE_URL) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const pool = createDatabaseClient({
    connectionString: env.DATABASE_URL,
    ssl: env.DATABASE_SSL,
  });

  try {
    const files = await readMigrationFiles(MIGRATIONS_DIR);
    logger.info({ files: files.length, directory: MIGRATIONS_DIR }, 'Migration files found');

    const report = await runMigrations(pool, files);
    logger.info(
      { applied: report.applied, skipped: report.skipped.length, modified: report.modified },
      report.applied.length === 0 ? 'Database is up to date' : 'Migration complete'
    );
  } finally {
    await closeDatabasePool();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Migration run failed');
  process.exit(1);
});
