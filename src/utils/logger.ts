/**
 * Logger
 *
 * Leveled console logger shared by every module. The level comes from
 * RECOGNITION_CACHE_LOG_LEVEL and output is suppressed while tests run.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_LABEL: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.cyan('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red('ERROR'),
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function resolveInitialLevel(): LogLevel {
  const fromEnv = process.env.RECOGNITION_CACHE_LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export class Logger {
  private level: LogLevel;

  constructor(private readonly scope: string, level: LogLevel = resolveInitialLevel()) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const line = `${chalk.dim(new Date().toISOString())} ${LEVEL_LABEL[level]} ${chalk.magenta(`[${this.scope}]`)} ${message}`;
    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';

    // stderr keeps CLI stdout clean for machine-readable output
    process.stderr.write(`${line}${suffix}\n`);
  }
}

export const logger = new Logger('recognition-cache');
