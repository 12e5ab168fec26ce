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
  ENDPOINT_RESOLVED = "endpoint_resolved",
  STATUS_QUERY = "status_query",
  STATUS_RECEIVED = "status_received",
  GEOCODE_START = "geocode_start",
  GEOCODE_RESOLVED = "geocode_resolved",
  MAP_FETCH = "map_fetch",
  IMAGE_PROCESSED = "image_processed",
  REQUEST_SEND = "request_send",
  REQUEST_COMPLETE = "request_complete",
  STREAM_CONNECTED = "stream_connected",
  STREAM_CLOSED = "stream_closed",
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
  data?: unknown;
};

/**
 * Logger class for handling application logging with severity levels and event tracking.
 * Supports console output at different levels (DEBUG, INFO, WARNING, ERROR) and
 * provides a listener system for external log processing.
 */
class Logger {
  private level: LogLevel = LogLevel.WARNING;
  private listeners: Set<(entry: LogEntry) => void> = new Set();

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
   * Registers a callback to be invoked for each log entry that meets the minimum level.
   * @returns Unsubscribe function to remove the listener
   */
  public onLog(listener: (entry: LogEntry) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private log(
    level: LogLevel,
    message: string,
    eventType?: LogEventType,
    data?: unknown,
  ): void {
    if (this.level <= level) {
      const levelNames = ["DEBUG", "INFO", "WARNING", "ERROR"];
      const levelName = levelNames[level];
      const output = `[${levelName}] ${message}`;

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

    // Listeners follow events even when console output is filtered
    if (eventType) {
      const entry: LogEntry = {
        level,
        message,
        timestamp: Date.now(),
        eventType,
        data,
      };
      this.listeners.forEach((listener) => listener(entry));
    }
  }

  /**
   * Logs a debug message. Only output if log level is DEBUG.
   */
  public debug(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, eventType, data);
  }

  /**
   * Logs an info message. Only output if log level is INFO or lower.
   */
  public info(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.INFO, message, eventType, data);
  }

  /**
   * Logs a warning message. Only output if log level is WARNING or lower.
   */
  public warning(
    message: string,
    eventType?: LogEventType,
    data?: unknown,
  ): void {
    this.log(LogLevel.WARNING, message, eventType, data);
  }

  /**
   * Logs an error message.
   */
  public error(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.ERROR, message, eventType, data);
  }
}

/**
 * Global logger instance for application-wide logging.
 */
export const logger = new Logger();
