/**
 * HTTP layer of the API client.
 *
 * Composes user-scoped URLs, attaches the `X-AIO-KEY` header, serializes
 * JSON bodies and translates every transport outcome into either a parsed
 * body or an `IoClientError`.
 */

import { logger as defaultLogger } from '@aio-rest/logger'
import type { Logger } from '@aio-rest/logger'
import { APIError, ConfigurationError, DecodingError, TransportError } from './errors'
import type { HttpMethod } from './errors'
import type { Transport, TransportHeaders, TransportResponse } from './transport'

export const DEFAULT_BASE_URL = 'https://io.adafruit.com/api'
export const DEFAULT_API_VERSION = 'v2'

export interface ApiClientOptions {
  username: string
  key: string
  /** Required; performs the actual network I/O */
  transport: Transport
  apiVersion?: string
  baseURL?: string
  logger?: Logger
}

/**
 * Client-side HTTP primitives shared by every resource service.
 *
 * Holds only immutable configuration. Sharing one instance between callers
 * is as safe as the transport it wraps.
 */
export class ApiClient {
  readonly username: string
  readonly apiVersion: string
  readonly baseURL: string
  private readonly key: string
  private readonly transport: Transport
  private readonly logger: Logger

  constructor(options: ApiClientOptions) {
    if (!options.transport) {
      throw new ConfigurationError('A transport is required')
    }
    if (!options.username) {
      throw new ConfigurationError('A username is required')
    }
    if (!options.key) {
      throw new ConfigurationError('An API key is required')
    }

    this.username = options.username
    this.key = options.key
    this.transport = options.transport
    this.apiVersion = options.apiVersion ?? DEFAULT_API_VERSION
    this.baseURL = (options.baseURL ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.logger = options.logger ?? defaultLogger
  }

  /**
   * Build the absolute URL for a resource path, e.g. `feeds/temp/data`.
   * No escaping is applied.
   */
  composePath(path: string): string {
    return `${this.baseURL}/${this.apiVersion}/${this.username}/${path}`
  }

  async get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path)
  }

  async post<T>(path: string, data: unknown): Promise<T> {
    return this.request<T>('POST', path, JSON.stringify(data))
  }

  async delete<T>(path: string): Promise<T> {
    return this.request<T>('DELETE', path)
  }

  private headers(method: HttpMethod): TransportHeaders {
    const headers: TransportHeaders = { 'X-AIO-KEY': this.key }
    if (method === 'POST') {
      headers['Content-Type'] = 'application/json'
    }
    return headers
  }

  private dispatch(method: HttpMethod, url: string, body: string | undefined): Promise<TransportResponse> {
    const headers = this.headers(method)
    switch (method) {
      case 'GET':
        return this.transport.get(url, headers)
      case 'POST':
        return this.transport.post(url, body ?? '', headers)
      case 'DELETE':
        return this.transport.delete(url, headers)
    }
  }

  private async request<T>(method: HttpMethod, path: string, body?: string): Promise<T> {
    const url = this.composePath(path)
    this.logger.debug(`${method} ${url}`)

    let response: TransportResponse
    try {
      response = await this.dispatch(method, url, body)
    } catch (error) {
      this.logger.warn(`${method} ${url} transport failure`, error)
      throw new TransportError(method, url, error)
    }

    let outcome: { ok: true; value: T } | { ok: false; error: unknown }
    try {
      outcome = { ok: true, value: await this.readBody<T>(method, url, response) }
    } catch (error) {
      outcome = { ok: false, error }
    }

    try {
      response.close()
    } catch (error) {
      this.logger.warn(`${method} ${url} failed to release response`, error)
      // A failure already in flight wins over the release failure
      if (outcome.ok) {
        throw new TransportError(method, url, error)
      }
    }

    if (!outcome.ok) {
      throw outcome.error
    }
    return outcome.value
  }

  private async readBody<T>(method: HttpMethod, url: string, response: TransportResponse): Promise<T> {
    if (response.status < 200 || response.status >= 300) {
      const errorBody = await this.readErrorBody(response)
      this.logger.warn(`${method} ${url} -> ${response.status}`)
      throw new APIError(method, url, response.status, errorBody)
    }

    try {
      return await response.json<T>()
    } catch (error) {
      this.logger.warn(`${method} ${url} returned an undecodable body`)
      throw new DecodingError(method, url, error)
    }
  }

  private async readErrorBody(response: TransportResponse): Promise<unknown> {
    try {
      return await response.json()
    } catch (error) {
      this.logger.debug('Error body is not JSON', error)
      return null
    }
  }
}
