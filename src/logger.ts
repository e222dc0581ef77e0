import { pino, type Logger } from 'pino';

/**
 * pino-pretty transport for local runs; plain JSON lines in tests and production
 */
export function prettyTransport() {
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'production') {
    return undefined;
  }
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
    },
  };
}

/**
 * Root logger for services. Fastify keeps its own request logger with the same settings.
 */
export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  return pino({
    level,
    transport: prettyTransport(),
  });
}
