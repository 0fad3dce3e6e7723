import { vi } from 'vitest'
import type { Logger } from '@aio-rest/logger'
import type { ApiClient } from '../client'
import { BufferedResponse } from '../transport'
import type { TransportHeaders, TransportResponse } from '../transport'

/**
 * Create a mock ApiClient with all HTTP methods mocked.
 */
export function createMockClient(): ApiClient {
  return {
    get: vi.fn(),
    post: vi.fn(),
    delete: vi.fn(),
    composePath: vi.fn(),
  } as unknown as ApiClient
}

export function createTestLogger(): Logger {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

type Outcome = { status: number; body: string } | { error: Error }

/**
 * In-process transport that answers every call with the configured outcome
 * and remembers each response it hands out.
 */
export function createFakeTransport() {
  const opened: BufferedResponse[] = []
  let outcome: Outcome = { status: 200, body: 'null' }

  const handle = async (): Promise<TransportResponse> => {
    if ('error' in outcome) throw outcome.error
    const response = new BufferedResponse(outcome.status, outcome.body)
    opened.push(response)
    return response
  }

  const transport = {
    get: vi.fn((_url: string, _headers: TransportHeaders) => handle()),
    post: vi.fn((_url: string, _body: string, _headers: TransportHeaders) => handle()),
    delete: vi.fn((_url: string, _headers: TransportHeaders) => handle()),
  }

  return {
    transport,
    opened,
    /** Objects are serialized; strings are sent as the raw body */
    respondWith(status: number, body: unknown) {
      outcome = { status, body: typeof body === 'string' ? body : JSON.stringify(body) }
    },
    failWith(error: Error) {
      outcome = { error }
    },
    unreleased(): BufferedResponse[] {
      return opened.filter((response) => !response.closed)
    },
  }
}
