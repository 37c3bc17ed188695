import type { Serializable } from './utils';

/**
 * Logging level enumeration
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  OFF = 100, // Disable all logs
}

/**
 * Structured metadata attached to an event log entry
 */
export type LogMetadata = Readonly<Record<string, Serializable>>;

/**
 * Logger interface
 */
export interface ILogger {
  /**
   * Sets logging level
   */
  setLevel(level: LogLevel): void;

  /**
   * Gets current logging level
   */
  getLevel(): LogLevel;

  /**
   * Checks if specified logging level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean;

  /**
   * Logs message with specified level
   * @param args Additional arguments passed through to the sink
   */
  log(level: LogLevel, message: string, ...args: readonly unknown[]): void;

  debug(message: string, ...args: readonly unknown[]): void;
  info(message: string, ...args: readonly unknown[]): void;
  warn(message: string, ...args: readonly unknown[]): void;
  error(message: string, ...args: readonly unknown[]): void;
  fatal(message: string, ...args: readonly unknown[]): void;

  /**
   * Logs a structured event at INFO level
   * @param category Event category (e.g. 'graph', 'control-flow', 'data-flow')
   * @param eventName Event name
   */
  logEvent(category: string, eventName: string, metadata?: LogMetadata): void;
}
