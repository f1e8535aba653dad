export { ConsoleLogger, NoopLogger, createLogger, redactContext, LOG_LEVELS } from './logging.js';
export type { Logger, LogLevel, ConsoleLoggerOptions } from './logging.js';
