/**
 * Logger that writes ONLY to stderr.
 *
 * Reports and SDL go to stdout so they can be piped or redirected; every
 * diagnostic line goes to stderr.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogData {
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_COLOR: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function formatLogLine(
  level: Exclude<LogLevel, 'silent'>,
  msg: string,
  data?: LogData
): string {
  const tag = LEVEL_COLOR[level](`[${level.toUpperCase().padEnd(5)}]`);
  const line = `${new Date().toISOString()} ${tag} ${msg}`;
  return data && Object.keys(data).length > 0 ? `${line} ${JSON.stringify(data)}` : line;
}

/**
 * Create a logger that drops messages below `level`.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_RANK[level];
  const write = (lvl: Exclude<LogLevel, 'silent'>, msg: string, data?: LogData): void => {
    if (LEVEL_RANK[lvl] < threshold) return;
    process.stderr.write(formatLogLine(lvl, msg, data) + '\n');
  };

  return {
    debug: (msg, data) => write('debug', msg, data),
    info: (msg, data) => write('info', msg, data),
    warn: (msg, data) => write('warn', msg, data),
    error: (msg, data) => write('error', msg, data),
  };
}

function levelFromEnv(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((l) => l === value) ?? 'info';
}

/** Shared logger; level from SCHEMA_EVOLUTION_LOG_LEVEL */
export const logger: Logger = createLogger(levelFromEnv(process.env.SCHEMA_EVOLUTION_LOG_LEVEL));
