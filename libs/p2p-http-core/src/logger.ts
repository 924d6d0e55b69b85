import type { Logger, LoggerMeta } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Writes structured lines to the console: `[prefix] event {meta}`.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix = 'p2p',
    private readonly minLevel: LogLevel = 'debug'
  ) {}

  debug(message: string, meta?: LoggerMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LoggerMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LoggerMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LoggerMeta): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: LoggerMeta): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    const line = `[${this.prefix}] ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      console[level](line, meta);
    } else {
      console[level](line);
    }
  }
}

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
