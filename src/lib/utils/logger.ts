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
  SCAN_START = "scan_start",
  DEVICE_FOUND = "device_found",
  CONNECT_START = "connect_start",
  CONNECTED = "connected",
  DISCOVER_CHAR = "discover_char",
  STATUS_WAIT = "status_wait",
  STATUS_RECEIVED = "status_received",
  JOB_START = "job_start",
  DATA_SEND_START = "data_send_start",
  DATA_SEND_PROGRESS = "data_send_progress",
  DATA_SEND_COMPLETE = "data_send_complete",
  COMPLETION_WAIT = "completion_wait",
  COMPLETION_RECEIVED = "completion_received",
  ACK_SENT = "ack_sent",
  JOB_DONE = "job_done",
  JOB_FAILED = "job_failed",
  FRAME_SENT = "frame_sent",
  FRAME_RECEIVED = "frame_received",
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

const LEVEL_NAMES = ["DEBUG", "INFO", "WARNING", "ERROR"] as const;

/**
 * Logger class for handling application logging with severity levels and event tracking.
 * Supports console output at different levels (DEBUG, INFO, WARNING, ERROR) and
 * provides a listener system for external log processing.
 */
export class Logger {
  private level: LogLevel = LogLevel.WARNING;
  private listeners: Set<(entry: LogEntry) => void> = new Set();
  private consoleEnabled = true;

  /**
   * Sets the minimum log level to output. Messages below this level will be ignored.
   * @param level Minimum log level (DEBUG, INFO, WARNING, or ERROR)
   */
  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Turns console output on or off. Listeners still receive entries, which is
   * how the ink UI takes over the terminal.
   */
  public setConsoleEnabled(enabled: boolean): void {
    this.consoleEnabled = enabled;
  }

  /**
   * Registers a callback to be invoked for each log entry that meets the minimum level.
   * @param listener Callback function that receives the log entry
   * @returns Unsubscribe function to remove the listener
   */
  public onLog(listener: (entry: LogEntry) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Internal logging method that processes log entries based on current level.
   * Outputs to appropriate console method and notifies all listeners.
   */
  private log(
    level: LogLevel,
    message: string,
    eventType?: LogEventType,
    data?: unknown,
  ): void {
    if (this.level > level) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      eventType,
      data,
    };

    if (this.consoleEnabled) {
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

  /**
   * Logs a debug message. Only emitted when the level is DEBUG.
   * @param message Debug message text
   * @param eventType Optional event type for the UI to react to
   * @param data Optional payload attached to the entry
   */
  public debug(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, eventType, data);
  }

  /**
   * Logs an info message. Emitted at INFO level or below.
   * @param message Info message text
   * @param eventType Optional event type for the UI to react to
   * @param data Optional payload attached to the entry
   */
  public info(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.INFO, message, eventType, data);
  }

  /**
   * Logs a warning. Emitted at WARNING level or below.
   * @param message Warning message text
   * @param eventType Optional event type for the UI to react to
   * @param data Optional payload attached to the entry
   */
  public warning(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.WARNING, message, eventType, data);
  }

  /**
   * Logs an error message. Emitted at every level; the console copy is
   * skipped while console output is disabled.
   * @param message Error message text
   * @param eventType Optional event type for the UI to react to
   * @param data Optional payload attached to the entry
   */
  public error(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.ERROR, message, eventType, data);
  }
}

/**
 * Global logger instance for application-wide logging.
 */
export const logger = new Logger();
