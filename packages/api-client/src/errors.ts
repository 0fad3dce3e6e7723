/**
 * Error taxonomy for the API client.
 *
 * Every failure surfaces as an `IoClientError` subclass; nothing is retried
 * or swallowed on the way out.
 */

export type HttpMethod = 'GET' | 'POST' | 'DELETE'

export class IoClientError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Missing or invalid credentials, transport or environment settings */
export class ConfigurationError extends IoClientError {}

/** The transport rejected before producing a response */
export class TransportError extends IoClientError {
  constructor(
    readonly method: HttpMethod,
    readonly url: string,
    cause: unknown
  ) {
    super(`${method} ${url} failed: ${describeCause(cause)}`, { cause })
  }
}

/** The server answered with a status outside 2xx */
export class APIError extends IoClientError {
  constructor(
    readonly method: HttpMethod,
    readonly url: string,
    readonly statusCode: number,
    readonly body: unknown
  ) {
    super(`${method} ${url} returned HTTP ${statusCode}`)
  }
}

/** A value the API cannot represent, rejected before any request is made */
export class ValidationError extends IoClientError {}

/** The response body was not valid JSON */
export class DecodingError extends IoClientError {
  constructor(
    readonly method: HttpMethod,
    readonly url: string,
    cause: unknown
  ) {
    super(`${method} ${url} returned a body that is not valid JSON: ${describeCause(cause)}`, { cause })
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
