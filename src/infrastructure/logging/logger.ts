import { pino } from 'pino';
import type { Logger } from 'pino';

export interface LoggerOptions {
  /** Minimum level. Default: `LOG_LEVEL` from the environment, else `'info'`. */
  readonly level?: string;
}

/**
 * Logger for the command line, pretty-printed through the pino-pretty
 * transport. Writes to stderr so that `--print-schema` output on stdout stays
 * clean.
 */
export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    base: undefined,
    transport: {
      target: 'pino-pretty',
      options: { colorize: process.stderr.isTTY, destination: 2, ignore: 'time' },
    },
  });
}
