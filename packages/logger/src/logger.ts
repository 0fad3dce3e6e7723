import log from 'loglevel'
import type { LogLevel, Logger, NamedLoggerOptions } from './types'

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent']

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn'

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Create (or reconfigure) a named logger.
 *
 * Loggers are cached by name, so calling this twice with the same name
 * returns the same instance with the latest level and prefix applied.
 */
export function createNamedLogger({
  name,
  level = DEFAULT_LOG_LEVEL,
  prefix,
}: NamedLoggerOptions): Logger {
  const instance = log.getLogger(name)
  const tag = prefix ?? `[${name}]`

  // Build on the root factory so repeated calls never stack prefixes
  instance.methodFactory = (methodName, logLevel, loggerName) => {
    const write = log.methodFactory(methodName, logLevel, loggerName)
    return (...args: unknown[]) => write(tag, ...args)
  }
  instance.setLevel(level, false)

  return instance
}

/**
 * Current level of a named logger.
 */
export function getLoggerLevel(name: string): LogLevel {
  return LOG_LEVELS[log.getLogger(name).getLevel()] ?? 'silent'
}

export const logger = createNamedLogger({ name: 'aio-rest' })
