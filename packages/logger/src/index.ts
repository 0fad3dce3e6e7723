export { createNamedLogger, getLoggerLevel, isLogLevel, logger, DEFAULT_LOG_LEVEL, LOG_LEVELS } from './logger'
export type { LogLevel, Logger, LoggerConfig, NamedLoggerOptions } from './types'
