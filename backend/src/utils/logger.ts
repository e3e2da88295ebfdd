import pino from 'pino';

/**
 * Application logger using Pino
 *
 * - Structured JSON logging in production
 * - Pretty printing in development
 * - Credentials are redacted wherever they appear in log fields
 */

const env = process.env.NODE_ENV || 'development';
const isTest = env === 'test' || process.env.VITEST !== undefined;
const isDevelopment = env !== 'production' && !isTest;

export const REDACTED_PATHS = [
  'credential',
  '*.credential',
  'apiKey',
  '*.apiKey',
  'token',
  '*.token',
  'headers["x-api-key"]',
  'headers["X-API-Key"]',
  'headers["X-eBirdApiToken"]',
  '*.headers["X-API-Key"]',
  '*.headers["X-eBirdApiToken"]',
];

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),

  transport: isDevelopment ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,

  redact: {
    paths: REDACTED_PATHS,
    censor: '[redacted]',
  },

  base: {
    env,
  },
});

/**
 * Create a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

export type Logger = ReturnType<typeof createLogger>;
