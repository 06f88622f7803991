import pino from 'pino';
import type { LogFormat } from './types.js';

export type Logger = pino.Logger;

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function build(level: string, format: LogFormat): pino.Logger {
  const options: pino.LoggerOptions = {
    level,
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (format === 'pretty') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2
        }
      }
    });
  }

  // stdout is reserved for command output
  return pino(options, pino.destination(2));
}

let baseLogger = build(defaultLevel(), process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json');

/**
 * Replaces the root logger. Loggers created afterwards inherit the new level
 * and format, so call this before constructing any component.
 */
export function configureLogging(options: { level?: string; format?: LogFormat }): void {
  baseLogger = build(options.level ?? defaultLevel(), options.format ?? 'json');
}

export function createLogger(component: string): Logger {
  return baseLogger.child({ component });
}
