import { LogLevel } from '../../types/enums';

/**
 * Destination for formatted log lines
 */
export type LogWriter = (level: LogLevel, line: string, args: unknown[]) => void;

const LEVELS: readonly LogLevel[] = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

const consoleWriter: LogWriter = (level, line, args) => {
  switch (level) {
    case LogLevel.ERROR:
      console.error(line, ...args);
      break;
    case LogLevel.WARN:
      console.warn(line, ...args);
      break;
    default:
      // eslint-disable-next-line no-console
      console.log(line, ...args);
  }
};

/**
 * Leveled logger used by the engine, detectors and collector.
 * Child loggers share the writer and inherit the level at creation time.
 */
export class Logger {
  private level: LogLevel;
  private readonly prefix: string;
  private readonly writer: LogWriter;

  constructor(level: LogLevel = LogLevel.INFO, prefix = '', writer: LogWriter = consoleWriter) {
    this.level = level;
    this.prefix = prefix;
    this.writer = writer;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getPrefix(): string {
    return this.prefix;
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.log(LogLevel.WARN, message, args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.log(LogLevel.INFO, message, args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.log(LogLevel.DEBUG, message, args);
    }
  }

  isDebugEnabled(): boolean {
    return this.shouldLog(LogLevel.DEBUG);
  }

  /**
   * Create child logger with prefix
   */
  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger(this.level, childPrefix, this.writer);
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const prefixStr = this.prefix ? `[${this.prefix}] ` : '';

    this.writer(level, `${timestamp} ${levelStr} ${prefixStr}${message}`, args);
  }

  private shouldLog(messageLevel: LogLevel): boolean {
    return LEVELS.indexOf(messageLevel) <= LEVELS.indexOf(this.level);
  }
}

/**
 * Parse a log level name, falling back when it is unknown
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? fallback;
}

/**
 * Global logger instance
 */
export const globalLogger = new Logger(parseLogLevel(process.env['RULESCOPE_LOG_LEVEL']));

/**
 * Create a logger instance
 */
export function createLogger(level: LogLevel = LogLevel.INFO, prefix = '', writer?: LogWriter): Logger {
  return new Logger(level, prefix, writer);
}
