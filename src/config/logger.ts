import pino from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

/**
 * Shared pipeline logger. Silent under test to keep runner output clean.
 */
export const logger = pino({
  name: 'momo-fraud-corpus',
  level: isTest ? 'silent' : LOG_LEVEL,
});

/**
 * Fastify logger options matching the pipeline logger
 */
export const serverLoggerOptions = isTest ? false : { level: LOG_LEVEL };
