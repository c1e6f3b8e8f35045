/**
 * Root pino logger factory.
 *
 * Components never create their own root logger; they receive one and
 * derive a child tagged with their component name.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Minimum level to emit (default: info) */
  level?: LevelWithSilent;
  /** Append to this file instead of stdout */
  destination?: string;
}

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env['MEDIA_SYNC_LOG_LEVEL'];
  const level = options.level ?? (envLevel && isLogLevel(envLevel) ? envLevel : 'info');

  const pinoOptions = {
    level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: 'media-sync' },
  };

  if (options.destination) {
    return pino(pinoOptions, pino.destination({ dest: options.destination, mkdir: true, sync: false }));
  }
  return pino(pinoOptions);
}

/** Logger that discards everything; used when no logger is supplied */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
