import { LoggerAdapter } from '../types';

export interface ConsoleLoggerOptions {
  /** Prepended to every line, e.g. `simrelay`. */
  prefix?: string;
  debug?: boolean;
}

export class ConsoleLoggerAdapter implements LoggerAdapter {
  constructor(private readonly options: ConsoleLoggerOptions = {}) {}

  log(message: string, context?: unknown): void {
    console.log(this.format('LOG', message), context ?? '');
  }

  error(message: string, error?: Error, context?: unknown): void {
    console.error(this.format('ERROR', message), error ?? '', context ?? '');
  }

  warn(message: string, context?: unknown): void {
    console.warn(this.format('WARN', message), context ?? '');
  }

  debug(message: string, context?: unknown): void {
    if (this.options.debug === false) {
      return;
    }

    console.debug(this.format('DEBUG', message), context ?? '');
  }

  private format(level: string, message: string): string {
    return this.options.prefix ? `[${level}] [${this.options.prefix}] ${message}` : `[${level}] ${message}`;
  }
}
