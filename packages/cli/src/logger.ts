/**
 * @module @crew-control/cli/logger
 * pino-backed ILogger.
 */

import { destination, pino, type DestinationStream, type LevelWithSilent, type Logger } from 'pino';
import type { ILogger, LogMeta } from '@crew-control/contracts';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

/**
 * `LOG_LEVEL` wins over the config file. Unknown values fall back to info.
 */
export function resolveLogLevel(envValue: string | undefined, configured?: string): LevelWithSilent {
  const candidate = (envValue?.trim() || configured || '').toLowerCase();
  return isLevel(candidate) ? candidate : 'info';
}

export interface PinoLoggerOptions {
  level: LevelWithSilent;
  pretty?: boolean;
  /** Defaults to stderr so stdout stays free for command output. */
  destination?: DestinationStream;
}

export function createPinoLogger(options: PinoLoggerOptions): Logger {
  const base = { level: options.level, base: { name: 'crew-control' } };
  if (options.destination) {
    return pino(base, options.destination);
  }
  if (options.pretty) {
    return pino({ ...base, transport: { target: 'pino-pretty', options: { destination: 2 } } });
  }
  return pino(base, destination(2));
}

/**
 * Adapt a pino logger to the injected logger port.
 */
export function toLogger(logger: Logger): ILogger {
  const write = (level: 'debug' | 'info' | 'warn' | 'error') => (message: string, meta?: LogMeta) => {
    if (meta && Object.keys(meta).length > 0) {
      logger[level](meta, message);
    } else {
      logger[level](message);
    }
  };
  return { debug: write('debug'), info: write('info'), warn: write('warn'), error: write('error') };
}
