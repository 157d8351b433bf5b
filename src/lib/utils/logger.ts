/**
 * Log severity levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
}

/**
 * Types of events that can be logged
 */
export enum LogEventType {
  IMAGE_CREATE_START = "image_create_start",
  HEADER_WRITTEN = "header_written",
  SEEDS_WRITTEN = "seeds_written",
  IMAGE_EXTENDED = "image_extended",
  IMAGE_READ = "image_read",
  MAGIC_VERIFIED = "magic_verified",
  HEADER_REWRITTEN = "header_rewritten",
  IMAGE_PADDED = "image_padded",
  IMAGE_WRITTEN = "image_written",
  GENERIC = "generic",
}

/**
 * A single log entry
 */
export type LogEntry = {
  level: LogLevel;
  message: string;
  timestamp: number;
  eventType?: LogEventType;
  data?: Record<string, unknown>;
};

export type LogListener = (entry: LogEntry) => void;

const LEVEL_NAMES = ["DEBUG", "INFO", "WARNING", "ERROR"] as const;

/**
 * Logger class for handling application logging with severity levels and event tracking.
 * Supports console output at different levels (DEBUG, INFO, WARNING, ERROR) and
 * provides a listener system for external log processing.
 */
export class Logger {
  private level: LogLevel = LogLevel.WARNING;
  private listeners: Set<LogListener> = new Set();

  /**
   * Sets the minimum log level to output. Messages below this level will be ignored.
   */
  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Registers a callback to be invoked for every log entry, regardless of level.
   * Step tracking in the UI depends on events logged at DEBUG.
   * @returns Unsubscribe function to remove the listener
   */
  public onLog(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private log(
    level: LogLevel,
    message: string,
    eventType?: LogEventType,
    data?: Record<string, unknown>,
  ): void {
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      eventType,
      data,
    };

    if (this.level <= level) {
      const output = `[${LEVEL_NAMES[level]}] ${message}`;

      switch (level) {
        case LogLevel.DEBUG:
          console.debug(output);
          break;
        case LogLevel.INFO:
          console.log(output);
          break;
        case LogLevel.WARNING:
          console.warn(output);
          break;
        case LogLevel.ERROR:
          console.error(output);
          break;
      }
    }

    this.listeners.forEach((listener) => listener(entry));
  }

  public debug(
    message: string,
    eventType?: LogEventType,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.DEBUG, message, eventType, data);
  }

  public info(
    message: string,
    eventType?: LogEventType,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.INFO, message, eventType, data);
  }

  public warning(
    message: string,
    eventType?: LogEventType,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.WARNING, message, eventType, data);
  }

  /**
   * Logs an error message. Output unless the level has been raised above ERROR.
   */
  public error(
    message: string,
    eventType?: LogEventType,
    data?: Record<string, unknown>,
  ): void {
    this.log(LogLevel.ERROR, message, eventType, data);
  }
}

/**
 * Global logger instance for application-wide logging.
 */
export const logger = new Logger();
