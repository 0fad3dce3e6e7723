/**
 * Environment configuration.
 *
 * Values come from `AIO_*` environment variables and are validated once,
 * up front, so a bad setting fails before any request is made.
 */

import { DEFAULT_LOG_LEVEL, isLogLevel } from '@aio-rest/logger'
import type { LogLevel } from '@aio-rest/logger'
import { DEFAULT_API_VERSION, DEFAULT_BASE_URL } from './client'
import { ConfigurationError } from './errors'
import { DEFAULT_TIMEOUT } from './transport'

export interface ClientConfig {
  username: string
  key: string
  baseURL: string
  apiVersion: string
  /** Transport timeout in milliseconds */
  timeout: number
  logLevel: LogLevel
}

export type Environment = Record<string, string | undefined>

export function loadConfig(env: Environment = process.env): ClientConfig {
  return {
    username: required(env, 'AIO_USERNAME'),
    key: required(env, 'AIO_KEY'),
    baseURL: env.AIO_BASE_URL || DEFAULT_BASE_URL,
    apiVersion: env.AIO_API_VERSION || DEFAULT_API_VERSION,
    timeout: parseTimeout(env.AIO_TIMEOUT_MS),
    logLevel: parseLogLevel(env.AIO_LOG_LEVEL),
  }
}

function required(env: Environment, name: string): string {
  const value = env[name]?.trim()
  if (!value) {
    throw new ConfigurationError(`${name} is not set`)
  }
  return value
}

function parseTimeout(raw: string | undefined): number {
  if (!raw) return DEFAULT_TIMEOUT
  const timeout = Number(raw)
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigurationError(`AIO_TIMEOUT_MS must be a positive integer, got "${raw}"`)
  }
  return timeout
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (!raw) return DEFAULT_LOG_LEVEL
  const level = raw.toLowerCase()
  if (!isLogLevel(level)) {
    throw new ConfigurationError(`AIO_LOG_LEVEL "${raw}" is not a known log level`)
  }
  return level
}
