import pino, { type Logger } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

export type { Logger };

/**
 * Creates a child logger scoped to a single interview session.
 */
export function createSessionLogger(
  sessionId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ sessionId, ...extra });
}

export default logger;
