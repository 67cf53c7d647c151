/**
 * Observability exports.
 */

export type { Logger, LogEntry, LogConfig, LogSink } from './logging';
export { LogLevel, ConsoleLogger, NoopLogger, DEFAULT_LOG_CONFIG, createLogger } from './logging';
