/**
 * Console logging with levels and scopes
 */

import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  color?: boolean;
}

const LABELS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', scope, color = true } = options;
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (lvl: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (LOG_LEVELS.indexOf(lvl) < threshold) return;

    const label = lvl.toUpperCase().padEnd(5);
    const prefix = scope ? `${label} [${scope}]` : label;
    const line = `${new Date().toISOString()} ${color ? LABELS[lvl](prefix) : prefix} ${message}`;
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';

    if (lvl === 'error') {
      console.error(line + suffix);
    } else if (lvl === 'warn') {
      console.warn(line + suffix);
    } else {
      console.log(line + suffix);
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    child: (child) => createLogger({ level, color, scope: scope ? `${scope}:${child}` : child }),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
