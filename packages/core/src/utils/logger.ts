/**
 * Logger for Stepwise
 * Thin level-aware facade over pino; writes JSON lines to stderr so stdout stays
 * free for agent output.
 */

import pino, { type Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.STEPWISE_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

class StepwiseLogger {
  constructor(private readonly base: Logger) {}

  setLevel(level: LogLevel): void {
    this.base.level = level;
  }

  getLevel(): LogLevel {
    return isLogLevel(this.base.level) ? this.base.level : 'info';
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown): void {
    if (data === undefined) {
      this.base[level](message);
    } else if (data instanceof Error) {
      this.base[level]({ err: data }, message);
    } else if (typeof data === 'object' && data !== null) {
      this.base[level](data, message);
    } else {
      this.base[level]({ detail: data }, message);
    }
  }
}

export type { StepwiseLogger };

export const logger = new StepwiseLogger(
  pino({ level: initialLevel(), base: { service: 'stepwise' } }, pino.destination(2))
);
