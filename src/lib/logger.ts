/**
 * Console logger with chalk colouring and level gating
 */

import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(tag: string): Logger;
}

export function createLogger(level: LogLevel = 'info', tag?: string): Logger {
  const enabled = (candidate: LogLevel) => LEVEL_RANK[candidate] >= LEVEL_RANK[level];
  const prefix = () => `${new Date().toISOString()}${tag ? ` [${tag}]` : ''}`;

  return {
    debug(message) {
      if (enabled('debug')) console.log(chalk.gray(`${prefix()} ${message}`));
    },
    info(message) {
      if (enabled('info')) console.log(`${chalk.gray(prefix())} ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(chalk.yellow(`${prefix()} ⚠ ${message}`));
    },
    error(message) {
      if (enabled('error')) console.error(chalk.red(`${prefix()} ✗ ${message}`));
    },
    child(childTag) {
      return createLogger(level, tag ? `${tag}:${childTag}` : childTag);
    },
  };
}

export const silentLogger: Logger = createLogger('silent');
