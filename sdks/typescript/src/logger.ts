/**
 * Logging for the Vaultline client.
 *
 * Operations that collapse failures into `null`/`false` report the cause
 * here instead, so the logger is the only place a transport error surfaces.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

/**
 * Sink for client diagnostics. Inject your own to route them elsewhere.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger that writes to the console with a `[tag]` prefix.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly tag: string = 'Vaultline',
    private level: LogLevel = LogLevel.ERROR
  ) {}

  setLogLevel(level: LogLevel): void {
    this.level = level;
  }

  getLogLevel(): LogLevel {
    return this.level;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.debug(`[${this.tag}] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      console.info(`[${this.tag}] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(`[${this.tag}] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(`[${this.tag}] ${message}`, ...args);
    }
  }

  /**
   * Create a logger with an extended tag and the same level.
   */
  child(subTag: string): ConsoleLogger {
    return new ConsoleLogger(`${this.tag}:${subTag}`, this.level);
  }
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Resolve the logger a client should use: an injected one wins, otherwise a
 * console logger that always reports failures and adds debug chatter when
 * `enableLogging` is set.
 */
export function resolveLogger(tag: string, logger?: Logger, enableLogging: boolean = false): Logger {
  if (logger) {
    return logger;
  }
  return new ConsoleLogger(tag, enableLogging ? LogLevel.DEBUG : LogLevel.ERROR);
}
