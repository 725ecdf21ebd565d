/**
 * Show the state of each migration file against schema_migrations
 *
 * Usage: DATABASE_URL=postgres://... tsx tools/migration-status.ts
 */

import { fileURLToPath } from 'node:url';
import { closeDatabasePool, createDatabaseClient, createLogger, validateEnv } from '@clinistock/core';
import { getMigrationStatus, readMigrationFiles } from './migrations/migrator.js';

const logger = createLogger({ name: 'migration-status' });

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
    const rows = await getMigrationStatus(pool, await readMigrationFiles(MIGRATIONS_DIR));
    for (const row of rows) {
      logger.info(row, 'Migration');
    }
    logger.info(
      {
        applied: rows.filter((row) => row.state === 'applied').length,
        pending: rows.filter((row) => row.state === 'pending').length,
        modified: rows.filter((row) => row.state === 'modified').length,
      },
      'Migration status'
    );
  } finally {
    await closeDatabasePool();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Migration status failed');
  process.exit(1);
});
