import { pino } from 'pino';
import type { Logger } from 'pino';
import { loadLogLevel } from '../config/environment.js';
import type { LogLevel } from '../config/environment.js';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Logger name. Default: `'pipebatch'`. */
  readonly name?: string;
  /** Minimum level. Default: `PIPEBATCH_LOG_LEVEL`, else `'info'`. */
  readonly level?: LogLevel;
}

/** Default logger of the engine: JSON lines on stdout. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'pipebatch',
    level: options.level ?? loadLogLevel(),
  });
}
