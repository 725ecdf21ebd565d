import { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Environment Variable Validation
 * Validated once at boot; every value has a development default except
 * the database URL, which is only required in production.
 */

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v.trim() === '') return fallback;
      const parsed = Number(v);
      if (!Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a number, got "${v}"` });
        return z.NEVER;
      }
      return parsed;
    });

// Base server config
const ServerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  PORT: numberFromEnv(3000).pipe(z.number().int().min(1).max(65535)),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

// Database config
const DatabaseEnvSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  DATABASE_SSL: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => v === 'true'),
  DATABASE_POOL_MAX: numberFromEnv(10).pipe(z.number().int().positive()),
});

// Fallbacks for replenishment parameters not set in the params table
const ReplenishmentEnvSchema = z.object({
  DEFAULT_SERVICE_LEVEL: numberFromEnv(0.95).pipe(z.number().gt(0).lt(1)),
  DEFAULT_LEAD_TIME_MEAN_DAYS: numberFromEnv(6).pipe(z.number().nonnegative()),
  DEFAULT_LEAD_TIME_STDDEV_DAYS: numberFromEnv(1).pipe(z.number().nonnegative()),
});

export const EnvSchema = ServerEnvSchema.merge(DatabaseEnvSchema).merge(ReplenishmentEnvSchema);

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validate environment variables
 * Throws a ValidationError listing every invalid key
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new ValidationError(`Environment validation failed:\n${errorMessages}`, errors);
  }

  if (result.data.NODE_ENV === 'production' && !result.data.DATABASE_URL) {
    throw new ValidationError('Environment validation failed:\n  DATABASE_URL: Required in production');
  }

  return result.data;
}

/**
 * Fallback replenishment parameters, used for any key missing from storage
 */
export function getReplenishmentDefaults(env: Env = validateEnv()): {
  serviceLevel: number;
  leadTimeMeanDays: number;
  leadTimeStdDevDays: number;
} {
  return {
    serviceLevel: env.DEFAULT_SERVICE_LEVEL,
    leadTimeMeanDays: env.DEFAULT_LEAD_TIME_MEAN_DAYS,
    leadTimeStdDevDays: env.DEFAULT_LEAD_TIME_STDDEV_DAYS,
  };
}
