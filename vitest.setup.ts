/**
 * Vitest Setup File
 * Quiet loggers before any module under test creates one
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

export {};
