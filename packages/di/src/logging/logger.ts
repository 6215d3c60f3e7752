/**
 * Logger used by registries to report wiring and construction activity.
 * Any logging library with these four methods can be plugged in.
 */
export interface Logger {
  debug: (message: string, context?: object) => void;
  info: (message: string, context?: object) => void;
  warn: (message: string, context?: object) => void;
  error: (message: string, context?: object) => void;
}

/**
 * Silent logger. Default for every registry.
 */
export class NullLogger implements Logger {
  debug() {
    /* no-op */
  }
  info() {
    /* no-op */
  }
  warn() {
    /* no-op */
  }
  error() {
    /* no-op */
  }
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelPriorities: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Writes to `console`, dropping messages below the configured level.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly prefix: string;

  /**
   * @param options.level - Minimum level to print. Defaults to 'info'.
   * @param options.prefix - Text placed before every message, e.g. the registry name.
   */
  constructor(options: { level?: LogLevel; prefix?: string } = {}) {
    this.minLevel = options.level ?? 'info';
    this.prefix = options.prefix ? `[${options.prefix}] ` : '';
  }

  private log(level: LogLevel, message: string, context?: object) {
    if (levelPriorities[level] < levelPriorities[this.minLevel]) {
      return;
    }

    const fullMessage = `[${level.toUpperCase()}] ${this.prefix}${message}`;
    if (context && Object.keys(context).length > 0) {
      console[level](fullMessage, context);
    } else {
      console[level](fullMessage);
    }
  }

  debug(message: string, context?: object) {
    this.log('debug', message, context);
  }
  info(message: string, context?: object) {
    this.log('info', message, context);
  }
  warn(message: string, context?: object) {
    this.log('warn', message, context);
  }
  error(message: string, context?: object) {
    this.log('error', message, context);
  }
}
