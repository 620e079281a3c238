import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const logger = pino({
  name: 'proposal-pipeline',
  level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
  // Provider credentials must never reach the log stream
  redact: {
    paths: ['api_key', 'apiKey', 'token', 'key', 'headers.authorization', 'headers.Authorization'],
    censor: '[redacted]',
  },
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

export type Logger = pino.Logger;

/**
 * Creates a child logger scoped to a single pipeline run.
 */
export function createRunLogger(
  runId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ run_id: runId, ...extra });
}

export default logger;
