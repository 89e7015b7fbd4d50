/**
 * Logger Utility
 *
 * Centralized console logging with configurable verbosity.
 * The LOG_LEVEL environment variable selects the level at startup;
 * the config file may override it once loaded.
 */

export enum LogLevel {
  SILENT = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.SILENT]: 'silent',
  [LogLevel.ERROR]: 'error',
  [LogLevel.WARN]: 'warn',
  [LogLevel.INFO]: 'info',
  [LogLevel.DEBUG]: 'debug',
};

type ConsoleMethod = 'log' | 'warn' | 'error';

class Logger {
  private static instance: Logger;
  private currentLevel: LogLevel;

  private constructor() {
    this.currentLevel = this.parseLogLevel(process.env.LOG_LEVEL || 'info');
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Parse a level name; unknown names fall back to info
   */
  public parseLogLevel(level: string): LogLevel {
    switch (level.toLowerCase().trim()) {
      case 'silent':
        return LogLevel.SILENT;
      case 'error':
        return LogLevel.ERROR;
      case 'warn':
      case 'warning':
        return LogLevel.WARN;
      case 'info':
        return LogLevel.INFO;
      case 'debug':
      case 'verbose':
        return LogLevel.DEBUG;
      default:
        console.warn(`Unknown LOG_LEVEL "${level}", defaulting to "info"`);
        return LogLevel.INFO;
    }
  }

  public setLogLevel(level: LogLevel | string): void {
    this.currentLevel = typeof level === 'string' ? this.parseLogLevel(level) : level;
  }

  public getLogLevelString(): string {
    return LEVEL_NAMES[this.currentLevel];
  }

  private formatMessage(level: string, message: string, context?: string): string {
    const contextStr = context ? `[${context}]` : '';
    return `${new Date().toISOString()} [${level}] ${contextStr} ${message}`;
  }

  private write(
    threshold: LogLevel,
    label: string,
    method: ConsoleMethod,
    message: string,
    context: string | undefined,
    extra: unknown[]
  ): void {
    if (this.currentLevel < threshold) return;
    const defined = extra.filter((value) => value !== undefined);
    console[method](this.formatMessage(label, message, context), ...defined);
  }

  public error(message: string, context?: string, error?: unknown): void {
    this.write(LogLevel.ERROR, 'ERROR', 'error', message, context, [error]);
  }

  public warn(message: string, context?: string, error?: unknown): void {
    this.write(LogLevel.WARN, 'WARN', 'warn', message, context, [error]);
  }

  public info(message: string, context?: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, 'INFO', 'log', message, context, args);
  }

  public debug(message: string, context?: string, ...args: unknown[]): void {
    this.write(LogLevel.DEBUG, 'DEBUG', 'log', message, context, args);
  }

  /**
   * Log a success message (info level)
   */
  public success(message: string, context?: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, 'INFO', 'log', message, context, args);
  }

  /**
   * Startup banners and shutdown notices; visible at every level except silent
   */
  public important(message: string, context?: string, ...args: unknown[]): void {
    this.write(LogLevel.ERROR, 'INFO', 'log', message, context, args);
  }
}

export const logger = Logger.getInstance();

export const log = {
  error: (message: string, context?: string, error?: unknown) => logger.error(message, context, error),
  warn: (message: string, context?: string, error?: unknown) => logger.warn(message, context, error),
  info: (message: string, context?: string, ...args: unknown[]) => logger.info(message, context, ...args),
  debug: (message: string, context?: string, ...args: unknown[]) => logger.debug(message, context, ...args),
  success: (message: string, context?: string, ...args: unknown[]) => logger.success(message, context, ...args),
  important: (message: string, context?: string, ...args: unknown[]) => logger.important(message, context, ...args),
};

export default logger;
