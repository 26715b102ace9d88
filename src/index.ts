export { parseConfig, loadConfigFile, glossaryConfigSchema, ConfigValidationError } from './config.js'
export type { GlossaryConfig, ParseConfigOptions } from './config.js'

export { InvalidArgumentError, GraphLoadError } from './types.js'
export type {
  Term,
  Relation,
  GraphBatch,
  TermLookup,
  RelationsResult,
  PathResult,
  AllTermsResult,
  ReloadResult,
} from './types.js'

export { TermIndex } from './graph/term-index.js'
export type { ReadonlyTermIndex } from './graph/term-index.js'
export { RelationIndex, relationKey } from './graph/relation-index.js'
export { buildSnapshot, graphBatchSchema } from './graph/snapshot.js'
export { listRelations, findPath, expandNeighbors, resolveDepth } from './graph/traversal.js'
export type {
  TraversalDirection,
  TraversalSettings,
  GraphSnapshot,
  TraversalOutcome,
} from './graph/traversal-types.js'
export { GraphStore, DEFAULT_TRAVERSAL_SETTINGS } from './graph/graph-store.js'
export type { GraphStoreOptions } from './graph/graph-store.js'
export { computeGraphStats } from './graph/stats.js'
export type { GraphStats, ConnectedTerm } from './graph/stats.js'

export { loadGraphBatch, GraphSourceError } from './source/csv-source.js'
export type { CsvSourceFiles } from './source/csv-source.js'

export { GlossaryService, GlossaryRequestError } from './service/glossary-service.js'
export type {
  TermRequest,
  RelationsRequest,
  PathRequest,
  ReloadRequest,
  TermMessage,
  RelationMessage,
  TermResponse,
  RelationsResponse,
  PathResponse,
  AllTermsResponse,
  ReloadResponse,
  GlossaryErrorCode,
} from './service/glossary-service.js'

export { createGlossary, reloadGlossary, resolveSourceFiles } from './glossary.js'
export type { Glossary, CreateGlossaryOptions } from './glossary.js'

export { emitMetric, appendMetricsFile, createMetricSink, createMetricEvent } from './metrics/index.js'
export type {
  MetricEvent,
  MetricData,
  MetricListener,
  ReloadMetrics,
  TraversalMetrics,
} from './metrics/index.js'
