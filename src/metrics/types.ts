/**
 * Structured metric types emitted by the graph store.
 * All types are immutable and serializable to JSON.
 */

/** Emitted after every load attempt, successful or not. */
export interface ReloadMetrics {
  readonly stage: 'reload'
  readonly ok: boolean
  readonly version: number
  readonly termCount: number
  readonly relationCount: number
  readonly danglingRelationCount: number
  readonly durationMs: number
}

/** Emitted after each relation listing or path search. */
export interface TraversalMetrics {
  readonly stage: 'traversal'
  readonly operation: 'list-relations' | 'find-path'
  readonly snapshotVersion: number
  /** Depth bound for list-relations; hop count of the found path for find-path. */
  readonly depth: number
  readonly visitedTerms: number
  readonly resultSize: number
  readonly truncated: boolean
}

/** Union of all metric payload types. */
export type MetricData = ReloadMetrics | TraversalMetrics

/** A timestamped metric event carrying one of the metric payloads. */
export interface MetricEvent {
  readonly stage: MetricData['stage']
  readonly timestamp: string
  readonly data: MetricData
}

/** Receives metric events; installed on the store through its options. */
export type MetricListener = (event: MetricEvent) => void

/** Wraps a payload in a {@link MetricEvent} stamped with the current time. */
export function createMetricEvent(data: MetricData): MetricEvent {
  return { stage: data.stage, timestamp: new Date().toISOString(), data }
}
