import { ILogger, LogLevel } from '../../types/logger';
import { ConsoleLoggerAdapter } from './console-logger-adapter';

/**
 * Factory for named console loggers. One instance per name.
 */
export class LoggerFactory {
  private static instance: LoggerFactory | undefined;
  private readonly loggers = new Map<string, ILogger>();

  private constructor() {
    // Private constructor for singleton
  }

  public static getInstance(): LoggerFactory {
    if (!LoggerFactory.instance) {
      LoggerFactory.instance = new LoggerFactory();
    }
    return LoggerFactory.instance;
  }

  /**
   * Create or get logger by name
   * @param level Initial logging level, applied only when the logger is created
   */
  public getLogger(name: string, level: LogLevel = LogLevel.INFO): ILogger {
    const existingLogger = this.loggers.get(name);
    if (existingLogger) {
      return existingLogger;
    }

    const logger = new ConsoleLoggerAdapter();
    logger.setLevel(level);

    this.loggers.set(name, logger);
    return logger;
  }

  public resetLoggers(): void {
    this.loggers.clear();
  }
}
