import { LogLevel } from '../../types/logger';
import { getErrorMessage } from '../errors';
import { LoggerAdapter } from './logger-adapter';

/**
 * Adapter for console logging with additional capabilities:
 * - storing log history in memory
 * - measuring operation execution time
 */
export class ConsoleLoggerAdapter extends LoggerAdapter {
  private logStorage: string[] = [];
  private maxLogSize = 100;

  log(level: LogLevel, message: string, ...args: readonly unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const formattedMessage = `[${new Date().toISOString()}] ${LogLevel[level]}: ${message}`;

    /* eslint-disable no-console */
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formattedMessage, ...args);
        break;
      case LogLevel.INFO:
        console.info(formattedMessage, ...args);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage, ...args);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(formattedMessage, ...args);
        break;
      default:
        console.log(formattedMessage, ...args);
    }
    /* eslint-enable no-console */

    this.addToStorage(formattedMessage);
  }

  private addToStorage(message: string): void {
    this.logStorage.push(message);

    if (this.logStorage.length > this.maxLogSize) {
      this.logStorage.shift();
    }
  }

  /**
   * Sets maximum size of stored logs
   */
  setMaxLogSize(size: number): void {
    this.maxLogSize = size > 0 ? size : 100;
  }

  clear(): void {
    this.logStorage = [];
  }

  /**
   * Returns all stored log lines, oldest first
   */
  getLogs(): string[] {
    return [...this.logStorage];
  }

  /**
   * Measures operation execution time and logs result
   * @param category Operation category
   * @param operation Operation name
   * @param action Function to execute
   * @returns Function execution result
   */
  measureTime<T>(category: string, operation: string, action: () => T): T {
    const start = performance.now();
    try {
      const result = action();
      const duration = performance.now() - start;
      this.logEvent(category, operation, { duration: `${duration.toFixed(2)}ms` });
      return result;
    } catch (error) {
      const duration = performance.now() - start;
      this.logEvent(category, `${operation}:error`, {
        duration: `${duration.toFixed(2)}ms`,
        error: getErrorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Extended version of error method with error stack support
   */
  public override error(message: string, ...args: readonly unknown[]): void {
    const errorObj = args.find((arg): arg is Error => arg instanceof Error);
    const otherArgs = args.filter(arg => !(arg instanceof Error));

    this.log(LogLevel.ERROR, errorObj ? `${message}: ${errorObj.message}` : message, ...otherArgs);

    if (errorObj?.stack) {
      this.log(LogLevel.DEBUG, `Stack: ${errorObj.stack}`);
    }
  }
}
