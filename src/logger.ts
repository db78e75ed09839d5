/**
 * Leveled console logger.
 *
 * Everything goes to stderr so reports printed on stdout stay machine-readable.
 * Level comes from OPENAPI_DIFF_LOG_LEVEL: silent, error, warn, info, debug (default: warn).
 */

import chalk from 'chalk';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function currentLevel(): number {
  const env = process.env['OPENAPI_DIFF_LOG_LEVEL']?.toLowerCase();
  if (env && isLogLevel(env)) {
    return LOG_LEVELS[env];
  }
  return LOG_LEVELS.warn;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] <= currentLevel();
}

export const logger = {
  debug(message: string): void {
    if (shouldLog('debug')) {
      console.error(chalk.dim(`  · ${message}`));
    }
  },

  info(message: string): void {
    if (shouldLog('info')) {
      console.error(chalk.blue('  i ') + message);
    }
  },

  warn(message: string): void {
    if (shouldLog('warn')) {
      console.error(chalk.yellow(`  ! ${message}`));
    }
  },

  error(message: string): void {
    if (shouldLog('error')) {
      console.error(chalk.red(`  x ${message}`));
    }
  },
};
