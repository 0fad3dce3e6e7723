/**
 * Facade exposing every telemetry operation on one object.
 */

import { createNamedLogger } from '@aio-rest/logger'
import type { Logger } from '@aio-rest/logger'
import type {
  DataPoint,
  DataPointOptions,
  DataValue,
  DeleteResponse,
  Feed,
  Group,
} from '@aio-rest/types'
import { ApiClient } from './client'
import type { ApiClientOptions } from './client'
import { loadConfig } from './config'
import type { ClientConfig, Environment } from './config'
import { DataService } from './services/data'
import { FeedService } from './services/feeds'
import { GroupService } from './services/groups'
import { AxiosTransport } from './transport'
import type { Transport } from './transport'

export class IoClient {
  readonly api: ApiClient
  readonly data: DataService
  readonly feeds: FeedService
  readonly groups: GroupService

  constructor(options: ApiClientOptions) {
    this.api = new ApiClient(options)
    this.data = new DataService(this.api)
    this.feeds = new FeedService(this.api)
    this.groups = new GroupService(this.api)
  }

  composePath(path: string): string {
    return this.api.composePath(path)
  }

  sendData(feedKey: string, value: DataValue, options?: DataPointOptions): Promise<DataPoint> {
    return this.data.sendData(feedKey, value, options)
  }

  receiveData(feedKey: string): Promise<DataPoint> {
    return this.data.receiveData(feedKey)
  }

  deleteData(feedKey: string, dataId: string): Promise<DeleteResponse> {
    return this.data.deleteData(feedKey, dataId)
  }

  getFeed(feedKey: string): Promise<Feed> {
    return this.feeds.getFeed(feedKey)
  }

  getAllFeeds(): Promise<Feed[]> {
    return this.feeds.getAllFeeds()
  }

  deleteFeed(feedKey: string): Promise<DeleteResponse> {
    return this.feeds.deleteFeed(feedKey)
  }

  getAllGroups(): Promise<Group[]> {
    return this.groups.getAllGroups()
  }

  createNewGroup(name: string, description: string): Promise<Group> {
    return this.groups.createNewGroup(name, description)
  }
}

export interface CreateClientOptions extends Partial<ClientConfig> {
  transport?: Transport
  logger?: Logger
  env?: Environment
}

/**
 * Build a client from `AIO_*` environment variables, with any explicit
 * option taking precedence. Uses an axios transport unless one is given.
 */
export function createClient(options: CreateClientOptions = {}): IoClient {
  const { transport, logger, env, ...overrides } = options
  const config = loadConfig({ ...(env ?? process.env), ...toEnv(overrides) })

  return new IoClient({
    username: config.username,
    key: config.key,
    baseURL: config.baseURL,
    apiVersion: config.apiVersion,
    transport: transport ?? new AxiosTransport({ timeout: config.timeout }),
    logger: logger ?? createNamedLogger({ name: `aio-rest:${config.username}`, level: config.logLevel }),
  })
}

function toEnv(overrides: Partial<ClientConfig>): Environment {
  const env: Environment = {}
  if (overrides.username !== undefined) env.AIO_USERNAME = overrides.username
  if (overrides.key !== undefined) env.AIO_KEY = overrides.key
  if (overrides.baseURL !== undefined) env.AIO_BASE_URL = overrides.baseURL
  if (overrides.apiVersion !== undefined) env.AIO_API_VERSION = overrides.apiVersion
  if (overrides.timeout !== undefined) env.AIO_TIMEOUT_MS = String(overrides.timeout)
  if (overrides.logLevel !== undefined) env.AIO_LOG_LEVEL = overrides.logLevel
  return env
}
