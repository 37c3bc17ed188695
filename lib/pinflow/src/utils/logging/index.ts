export { LoggerAdapter } from './logger-adapter';
export { ConsoleLoggerAdapter } from './console-logger-adapter';
export { LoggerFactory } from './logger-factory';
export { LoggerManager } from './logger-manager';

export { LogLevel } from '../../types/logger';
