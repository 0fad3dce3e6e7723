/**
 * Shared type definitions for the telemetry API client.
 */

export * from './models'
export * from './api'
