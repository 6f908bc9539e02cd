import pino from 'pino';

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

/**
 * Creates a child logger scoped to a specific conversation session.
 */
export function createSessionLogger(
  sessionId: string | null | undefined,
  extra?: Record<string, unknown>,
) {
  return logger.child({ sessionId: sessionId ?? null, ...extra });
}

export default logger;
