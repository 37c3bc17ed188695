import { ILogger, LogLevel, LogMetadata } from '../../types/logger';
import { getErrorMessage } from '../errors';

/**
 * Base class for logger adapters.
 * Concrete adapters only decide where a formatted line goes.
 */
export abstract class LoggerAdapter implements ILogger {
  protected level: LogLevel = LogLevel.INFO;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  /**
   * Logs message with specified level
   * This method must be implemented in concrete adapters
   */
  abstract log(level: LogLevel, message: string, ...args: readonly unknown[]): void;

  debug(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.WARN, message, ...args);
  }

  error(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.ERROR, message, ...args);
  }

  fatal(message: string, ...args: readonly unknown[]): void {
    this.log(LogLevel.FATAL, message, ...args);
  }

  /**
   * Logs event with metadata as a single INFO line:
   * `[EVENT][category][eventName] {"key":"value"}`
   */
  logEvent(category: string, eventName: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled(LogLevel.INFO)) {
      return;
    }

    let message = `[EVENT][${category}][${eventName}]`;

    if (metadata) {
      try {
        message += ` ${JSON.stringify(metadata)}`;
      } catch (error) {
        message += ` (metadata serialization error: ${getErrorMessage(error)})`;
      }
    }

    this.log(LogLevel.INFO, message);
  }
}
