import pino, { type Logger } from 'pino';
import { LogLevel } from './types/index.js';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/**
 * Logs go to stderr so stdout stays free for the interactive session.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level || 'info',
      name: options.name || 'query-handler'
    },
    pino.destination(2)
  );
}

export type { Logger };
