import { appendFileSync } from 'node:fs';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export const noopLogger: Partial<Logger> = {};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** When set, every emitted record is also appended to this file as one JSON line. */
  logFilePath?: string;
  /** Destination for formatted lines; defaults to the global console. */
  sink?: Pick<Console, 'log' | 'error'>;
  clock?: () => Date;
}

/**
 * Creates a level-filtered logger that prints coloured lines and optionally
 * mirrors them to a JSONL file.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? globalThis.console;
  const clock = options.clock ?? (() => new Date());

  function emit(level: LogLevel, message: string, meta?: LogMeta): void {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const metaText = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const line = `${LEVEL_STYLE[level](level.toUpperCase().padEnd(5))} ${message}${chalk.dim(metaText)}`;
    if (level === 'error' || level === 'warn') {
      sink.error(line);
    } else {
      sink.log(line);
    }
    if (options.logFilePath) {
      const record = { time: clock().toISOString(), level, message, ...meta };
      appendFileSync(options.logFilePath, `${JSON.stringify(record)}\n`, 'utf8');
    }
  }

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
}
