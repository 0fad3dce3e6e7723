import type {
  CreateDataRequest,
  DataPoint,
  DataPointOptions,
  DataValue,
  DeleteResponse,
} from '@aio-rest/types'
import type { ApiClient } from '../client'
import { ValidationError } from '../errors'

/**
 * Feed data API service.
 *
 * Sends, reads and deletes individual data points on a feed.
 */
export class DataService {
  constructor(private readonly client: ApiClient) {}

  /**
   * Send a value to a feed. Options left out are posted as null.
   */
  async sendData(
    feedKey: string,
    value: DataValue,
    options: DataPointOptions = {}
  ): Promise<DataPoint> {
    return this.client.post<DataPoint>(`feeds/${feedKey}/data`, createDataRequest(value, options))
  }

  /**
   * Get the most recent data point of a feed.
   */
  async receiveData(feedKey: string): Promise<DataPoint> {
    return this.client.get<DataPoint>(`feeds/${feedKey}/data/last`)
  }

  /**
   * Delete one data point from a feed.
   */
  async deleteData(feedKey: string, dataId: string): Promise<DeleteResponse> {
    return this.client.delete<DeleteResponse>(`feeds/${feedKey}/data/${dataId}`)
  }
}

/**
 * Build the data point body. Non-finite numbers are rejected: JSON has no
 * encoding for them.
 */
export function createDataRequest(value: DataValue, options: DataPointOptions = {}): CreateDataRequest {
  const { createdAt } = options
  if (typeof value === 'number') {
    requireFinite('value', value)
  }
  return {
    value,
    lat: optionalFinite('lat', options.lat),
    lon: optionalFinite('lon', options.lon),
    ele: optionalFinite('ele', options.ele),
    created_at: createdAt instanceof Date ? createdAt.toISOString() : createdAt ?? null,
  }
}

function requireFinite(field: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a finite number, got ${value}`)
  }
  return value
}

function optionalFinite(field: string, value: number | undefined): number | null {
  return value === undefined ? null : requireFinite(field, value)
}
