/**
 * Resource models as returned by the telemetry service.
 *
 * The client never reshapes server representations, so each model lists
 * the fields callers commonly read and passes everything else through.
 */

/** Any value that survives a JSON round trip */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

/** Scalar value carried by a data point */
export type DataValue = string | number | boolean

/** One telemetry sample on a feed */
export interface DataPoint {
  id?: string
  value: DataValue
  lat?: number | null
  lon?: number | null
  ele?: number | null
  created_at?: string | null
  feed_id?: number
  feed_key?: string
  [field: string]: unknown
}

/** Telemetry stream addressed by its key */
export interface Feed {
  key: string
  id?: number
  name?: string
  description?: string | null
  last_value?: string | null
  [field: string]: unknown
}

/** Named collection of feeds */
export interface Group {
  key?: string
  id?: number
  name: string
  description?: string | null
  feeds?: Feed[]
  [field: string]: unknown
}
