/**
 * Observability - Public API
 */

export { Logger, LOG_LEVELS, isLogLevel } from './logger';
export type { LogLevel, LogContext, LogSink } from './logger';
