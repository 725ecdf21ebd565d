import { randomUUID } from 'node:crypto';
import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Structured JSON logger
 * Patient references and credentials never reach the log output
 */

const CENSOR = '[REDACTED]';

// Matched case-insensitively as a substring of the key
const SENSITIVE_KEYS = [
  'patient',
  'paciente',
  'responsible',
  'responsavel',
  'password',
  'secret',
  'token',
  'authorization',
  'cookie',
  'databaseurl',
  'connectionstring',
] as const;

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((field) => lower.includes(field));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    redacted[key] = isSensitiveKey(key) ? CENSOR : redactObject(value);
  }
  return redacted;
}

/**
 * Replace sensitive keys at any depth of arrays and plain objects
 *
 * Errors and other class instances are left to their serializers.
 */
export function redactObject(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactObject);
  if (isPlainObject(value)) return redactRecord(value);
  return value;
}

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  /** Bound to every line, e.g. the id of a rebuild or verification run */
  correlationId?: string;
}

/**
 * Create a named logger instance
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = defaultLevel(), correlationId } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    base: correlationId ? { correlationId } : {},
    formatters: {
      level: (label) => ({ level: label }),
      log: redactRecord,
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return pino(loggerOptions);
}

export function generateCorrelationId(): string {
  return randomUUID();
}

// Default logger instance
export const logger = createLogger({ name: 'clinistock' });

export type { Logger };
