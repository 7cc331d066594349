/**
 * Console logger for the CLI.
 *
 * Writes `<timestamp> [LEVEL] message {meta}` lines to stderr so stdout only carries
 * command output. Levels below the configured minimum are dropped.
 */

import type { RecommendationLogger } from '@shelfwise/shared';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVEL_NAMES[number];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger extends RecommendationLogger {
  error(message: string, meta?: Record<string, unknown>, error?: unknown): void;
}

export interface LoggerOptions {
  level: LogLevel;
  write?: (line: string) => void;
  now?: () => Date;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function formatLine(
  timestamp: string,
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>
): string {
  const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const write = options.write ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());
  const minimum = LOG_LEVELS[options.level];

  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < minimum) return;
    write(formatLine(now().toISOString(), level, message, meta));
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta, error) => {
      log('error', message, meta);
      if (error !== undefined && LOG_LEVELS.error >= minimum) {
        write(`  ${formatError(error)}`);
      }
    },
  };
}
