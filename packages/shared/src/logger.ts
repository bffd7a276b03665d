import pino from 'pino';
import type { LogLevel } from './config.js';

export function createLogger(name: string, level: LogLevel = 'info'): Logger {
  return pino({
    name,
    level,
    transport:
      process.env.NODE_ENV !== 'production' && level !== 'silent'
        ? { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname' } }
        : undefined,
  });
}

/** Child logger scoped to one document run. */
export function forDocument(logger: Logger, documentId: string): Logger {
  return logger.child({ documentId });
}

export type Logger = pino.Logger;
