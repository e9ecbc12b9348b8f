import pino, { type Logger } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
  redact: ['apiKey', '*.apiKey', 'headers.authorization'],
  ...(isProduction
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, destination: 2 },
        },
      }),
});

export type { Logger };

/**
 * Creates a child logger scoped to a single HTTP request.
 */
export function createRequestLogger(
  requestId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ requestId, ...extra });
}

export default logger;
