/**
 * Transport contract and the default axios-backed implementation.
 *
 * The client composes URLs, headers and bodies; a transport only moves
 * bytes. Pooling, TLS, retries and timeouts are configured here, not on
 * the client.
 */

import axios from 'axios'
import type { AxiosInstance, AxiosResponse } from 'axios'

export type TransportHeaders = Record<string, string>

export interface TransportResponse {
  readonly status: number
  /** Parse the body as JSON; an empty body parses to `null` */
  json<T = unknown>(): Promise<T>
  /** Release the underlying response. Safe to call more than once. */
  close(): void
}

export interface Transport {
  get(url: string, headers: TransportHeaders): Promise<TransportResponse>
  post(url: string, body: string, headers: TransportHeaders): Promise<TransportResponse>
  delete(url: string, headers: TransportHeaders): Promise<TransportResponse>
}

/**
 * A response whose body has already been read into memory.
 */
export class BufferedResponse implements TransportResponse {
  private released = false

  constructor(
    readonly status: number,
    private readonly body: string
  ) {}

  get closed(): boolean {
    return this.released
  }

  async json<T = unknown>(): Promise<T> {
    return JSON.parse(this.body.trim() === '' ? 'null' : this.body)
  }

  close(): void {
    this.released = true
  }
}

export interface AxiosTransportOptions {
  timeout?: number
}

export const DEFAULT_TIMEOUT = 30000

/**
 * Transport over axios. HTTP status never rejects; only network-level
 * failures (DNS, refused connection, timeout) do.
 */
export class AxiosTransport implements Transport {
  private readonly http: AxiosInstance

  constructor(options: AxiosTransportOptions = {}) {
    this.http = axios.create({
      timeout: options.timeout ?? DEFAULT_TIMEOUT,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    })
  }

  async get(url: string, headers: TransportHeaders): Promise<TransportResponse> {
    return toResponse(await this.http.get<unknown>(url, { headers }))
  }

  async post(url: string, body: string, headers: TransportHeaders): Promise<TransportResponse> {
    return toResponse(await this.http.post<unknown>(url, body, { headers }))
  }

  async delete(url: string, headers: TransportHeaders): Promise<TransportResponse> {
    return toResponse(await this.http.delete<unknown>(url, { headers }))
  }
}

function toResponse(response: AxiosResponse<unknown>): BufferedResponse {
  const { data } = response
  const body = typeof data === 'string' ? data : data == null ? '' : JSON.stringify(data)
  return new BufferedResponse(response.status, body)
}
