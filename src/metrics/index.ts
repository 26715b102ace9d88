export type {
  ReloadMetrics,
  TraversalMetrics,
  MetricData,
  MetricEvent,
  MetricListener,
} from './types.js'
export { createMetricEvent } from './types.js'
export { emitMetric, appendMetricsFile, createMetricSink } from './sink.js'
