/**
 * pino logger factory.
 *
 * Logs go to stderr so that stdout stays free for command output.
 * Pretty mode routes through the pino-pretty transport.
 */

import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export interface LoggerOptions {
  /** Minimum level to emit (default: warn) */
  level?: LevelWithSilent;

  /** Human-readable output via pino-pretty instead of JSON lines */
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'warn';

  if (options.pretty) {
    return pino({
      name: 'raw-transfer',
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ name: 'raw-transfer', level }, pino.destination({ dest: 2, sync: true }));
}

/**
 * Child logger for a component; `quiet` silences it regardless of the parent level.
 */
export function componentLogger(parent: Logger, component: string, quiet = false): Logger {
  return quiet
    ? parent.child({ component }, { level: 'silent' })
    : parent.child({ component });
}
