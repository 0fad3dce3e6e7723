/**
 * API client package entry point.
 */

export { ApiClient, DEFAULT_API_VERSION, DEFAULT_BASE_URL } from './client'
export type { ApiClientOptions } from './client'
export { IoClient, createClient } from './io'
export type { CreateClientOptions } from './io'
export { loadConfig } from './config'
export type { ClientConfig, Environment } from './config'
export { DataService, createDataRequest } from './services/data'
export { FeedService } from './services/feeds'
export { GroupService } from './services/groups'
export { AxiosTransport, BufferedResponse, DEFAULT_TIMEOUT } from './transport'
export type {
  AxiosTransportOptions,
  Transport,
  TransportHeaders,
  TransportResponse,
} from './transport'
export {
  IoClientError,
  ConfigurationError,
  TransportError,
  APIError,
  DecodingError,
  ValidationError,
} from './errors'
export type { HttpMethod } from './errors'
