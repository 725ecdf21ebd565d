/**
 * Application configuration
 *
 * Derived from the validated environment in @clinistock/core
 */

import { getReplenishmentDefaults, validateEnv, type Env } from '@clinistock/core';

function parseCorsOrigins(raw: string | undefined): string[] | false {
  if (!raw) return false;
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const env: Env = validateEnv(source);

  return {
    env: env.NODE_ENV,
    isDev: env.NODE_ENV === 'development',
    isProd: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
    server: {
      port: env.PORT,
      host: env.HOST,
      corsOrigins: parseCorsOrigins(source.CORS_ORIGIN),
    },
    logger: {
      level: env.LOG_LEVEL,
    },
    database: {
      connectionString: env.DATABASE_URL,
      ssl: env.DATABASE_SSL,
      maxConnections: env.DATABASE_POOL_MAX,
    },
    replenishment: getReplenishmentDefaults(env),
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;
