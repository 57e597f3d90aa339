export enum LogLevel {
  DEBUG,
  INFO,
  WARN,
  ERROR,
}

const LOG_LEVEL_NAMES = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVELS_BY_NAME, value);
}

export class Logger {
  private static instance: Logger | undefined;
  private logLevel: LogLevel = LogLevel.INFO;
  private readonly scope: string | null;
  private readonly parent: Logger | null;

  constructor(scope: string | null = null, parent: Logger | null = null) {
    this.scope = scope;
    this.parent = parent;
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Scoped logger sharing this logger's level, e.g. `logger.child('sim')`
   * prints `[sim] message`.
   */
  public child(scope: string): Logger {
    const name = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(name, this.root());
  }

  public setLogLevel(level: LogLevel | LogLevelName): void {
    this.root().logLevel = typeof level === 'string' ? LEVELS_BY_NAME[level] : level;
  }

  public getLogLevel(): LogLevel {
    return this.root().logLevel;
  }

  private root(): Logger {
    return this.parent ? this.parent.root() : this;
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (level >= this.getLogLevel()) {
      const timestamp = new Date().toISOString();
      const levelName = LOG_LEVEL_NAMES[level];
      const text = this.scope ? `[${this.scope}] ${message}` : message;
      console.log(`[${timestamp}] [${levelName}] ${text}`, ...args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  public info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  public warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, ...args);
  }

  public error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, ...args);
  }
}

export const logger = Logger.getInstance();
