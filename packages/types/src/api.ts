/**
 * Request and response payload definitions.
 */

import type { DataValue, JsonValue } from './models'

/** Body posted to `feeds/{key}/data`; absent fields are sent as null */
export interface CreateDataRequest {
  value: DataValue
  lat: number | null
  lon: number | null
  ele: number | null
  created_at: string | null
}

/** Optional location and timestamp for a new data point */
export interface DataPointOptions {
  lat?: number
  lon?: number
  ele?: number
  createdAt?: string | Date
}

/** Create group request */
export interface CreateGroupRequest {
  name: string
  description: string
}

/** Acknowledgment body of a DELETE, `null` when the server sends none */
export type DeleteResponse = JsonValue
