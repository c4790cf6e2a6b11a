/**
 * Logging shared by every crewroom package.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Simple logger interface
 */
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Console logger implementation, prefixing each line with its component
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly level: LogLevel = 'info'
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) console.log(`[${this.component}] INFO:`, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) console.error(`[${this.component}] ERROR:`, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) console.warn(`[${this.component}] WARN:`, message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) console.debug(`[${this.component}] DEBUG:`, message, ...args);
  }
}

export function createLogger(component: string, level: LogLevel = 'info'): Logger {
  return new ConsoleLogger(component, level);
}

/** Discards everything; handy as a default in tests */
export const silentLogger: Logger = {
  info: () => {},
  error: () => {},
  warn: () => {},
  debug: () => {},
};
