/**
 * API server entry point: PostgreSQL repositories behind the HTTP routes
 */

import { closeDatabasePool, createDatabaseClient, logger } from '@clinistock/core';
import { createPostgresReplenishmentRepositories } from '@clinistock/infrastructure';

import { buildApp } from './app.js';
import { loadConfig } from './config.js';

async function main(): Promise<void> {
  const config = loadConfig();

  const pool = createDatabaseClient({
    connectionString: config.database.connectionString,
    ssl: config.database.ssl,
    maxConnections: config.database.maxConnections,
  });

  const app = await buildApp({
    repositories: createPostgresReplenishmentRepositories(pool),
    defaults: config.replenishment,
    logLevel: config.logger.level,
    corsOrigins: config.server.corsOrigins,
    checkDatabase: async () => {
      await pool.query('SELECT 1');
    },
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      logger.info({ signal }, 'Shutdown already in progress');
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    try {
      await app.close();
      await closeDatabasePool();
      logger.info('Server closed');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => void shutdown(signal));
  }

  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
    process.exit(1);
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address, env: config.env }, 'Clinistock API server started');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error during startup');
  process.exit(1);
});
