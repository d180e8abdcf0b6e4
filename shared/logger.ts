import { pino, type DestinationStream, type Logger } from 'pino';
import { z } from 'zod';

import type { ErrorTracker } from './error_tracker.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const logLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(LOG_LEVELS))
  .default('info');

// pino numeric levels
const WARN_LEVEL = 40;
const ERROR_LEVEL = 50;

export interface LoggerOptions {
  name: string;
  level: LogLevel;
  tracker: ErrorTracker;
  destination?: DestinationStream;
}

export type { Logger };

export function createLogger(options: LoggerOptions): Logger {
  const { tracker } = options;
  const settings = {
    name: options.name,
    level: options.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    hooks: {
      logMethod(this: Logger, args: Parameters<Logger['info']>, method: Logger['info'], level: number) {
        if (level >= ERROR_LEVEL) {
          tracker.record('error', firstMessage(args));
        } else if (level === WARN_LEVEL) {
          tracker.record('warn');
        }
        method.apply(this, args);
      },
    },
  };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

function firstMessage(args: unknown[]): string | undefined {
  return args.find((arg): arg is string => typeof arg === 'string');
}
