/**
 * Logger factory
 *
 * One pino instance is created at startup and handed to Fastify and to
 * every service that logs. Output is JSON lines on stdout, and optionally
 * appended to a log file as well.
 */

import pino, { type DestinationStream, type Level, type Logger } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = Level | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
];

export interface LoggerOptions {
  level?: LogLevel;
  /** Also append log lines to this file */
  file?: string;
  /** Override the destination entirely (tests) */
  destination?: DestinationStream;
  name?: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions = {
    name: options.name ?? 'pixhold',
    level: options.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (options.destination) {
    return pino(pinoOptions, options.destination);
  }

  if (options.file) {
    const streams = pino.multistream([
      { stream: process.stdout },
      { stream: pino.destination({ dest: options.file, mkdir: true, sync: false }) }
    ]);
    return pino(pinoOptions, streams);
  }

  return pino(pinoOptions);
}
