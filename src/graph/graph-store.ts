/**
 * graph-store.ts — The glossary graph engine.
 *
 * Holds one immutable {@link GraphSnapshot} and answers every query against
 * it. A reload builds the next snapshot off to the side and then replaces the
 * reference in a single assignment, so a query sees either the old graph or
 * the new one, never a mix.
 *
 * Concurrency: reloads are serialized via ReloadLock. Queries are synchronous
 * and lock-free; each reads the current snapshot reference once.
 */

import { ConfigValidationError, traversalSchema } from '../config.js'
import { InvalidArgumentError } from '../types.js'
import type {
  AllTermsResult,
  PathResult,
  Relation,
  RelationsResult,
  ReloadResult,
  TermLookup,
} from '../types.js'
import { createMetricEvent } from '../metrics/types.js'
import type { MetricData, MetricListener } from '../metrics/types.js'
import { ReloadLock } from './reload-lock.js'
import { buildSnapshot } from './snapshot.js'
import { computeGraphStats } from './stats.js'
import type { GraphStats } from './stats.js'
import { findPath, listRelations } from './traversal.js'
import type { GraphSnapshot, TraversalSettings } from './traversal-types.js'

export const DEFAULT_TRAVERSAL_SETTINGS: TraversalSettings = Object.freeze(traversalSchema.parse({}))

export interface GraphStoreOptions {
  /**
   * Overrides for individual traversal settings. Absent or `undefined`
   * entries keep their defaults; the result is checked against the same
   * bounds as the `traversal` config block.
   */
  readonly traversal?: Partial<TraversalSettings>
  /** Receives reload and traversal metrics. */
  readonly onMetric?: MetricListener
}

export class GraphStore {
  private current: GraphSnapshot
  private readonly settings: TraversalSettings
  private readonly onMetric: MetricListener | undefined
  private readonly reloadLock = new ReloadLock()

  private constructor(snapshot: GraphSnapshot, settings: TraversalSettings, onMetric: MetricListener | undefined) {
    this.current = snapshot
    this.settings = settings
    this.onMetric = onMetric
  }

  /**
   * Builds a store whose first snapshot (version 1) comes from `batch`.
   *
   * @throws {ConfigValidationError} if `options.traversal` is out of bounds.
   * @throws {GraphLoadError} if the batch is malformed.
   */
  static fromBatch(batch: unknown, options: GraphStoreOptions = {}): GraphStore {
    const settings = resolveTraversalSettings(options.traversal)
    const startedAt = Date.now()
    let snapshot: GraphSnapshot
    try {
      snapshot = buildSnapshot(batch, 1)
    } catch (err) {
      options.onMetric?.(createMetricEvent(failedLoadMetrics(1, startedAt)))
      throw err
    }
    const store = new GraphStore(snapshot, settings, options.onMetric)
    store.announce(snapshot, startedAt)
    return store
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Current snapshot version; 1 after construction, +1 per successful reload. */
  get version(): number {
    return this.current.version
  }

  /** The snapshot queries currently run against. */
  snapshot(): GraphSnapshot {
    return this.current
  }

  /** Exact, case-sensitive lookup. */
  getTerm(name: string): TermLookup {
    assertTermName(name, 'name')
    const term = this.current.terms.get(name)
    return term ? { found: true, term } : { found: false, term: null }
  }

  /** Direct outgoing relations of `name`, in insertion order. */
  relationsFrom(name: string): readonly Relation[] {
    assertTermName(name, 'name')
    return this.current.relations.relationsFrom(name)
  }

  /**
   * Relations reachable from `name` within `maxDepth` outgoing hops.
   * `maxDepth` absent or `<= 0` uses `defaultRelationDepth`.
   */
  listRelations(name: string, maxDepth?: number): RelationsResult {
    assertTermName(name, 'name')
    const snapshot = this.current
    const { result, visitedTerms } = listRelations(snapshot, name, maxDepth, this.settings)
    this.record({
      stage: 'traversal',
      operation: 'list-relations',
      snapshotVersion: snapshot.version,
      depth: result.depth,
      visitedTerms,
      resultSize: result.totalCount,
      truncated: result.truncated,
    })
    return result
  }

  /**
   * Shortest path from `source` to `target` of at most `maxDepth` hops.
   * `maxDepth` absent or `<= 0` uses `defaultPathDepth`.
   */
  findPath(source: string, target: string, maxDepth?: number): PathResult {
    assertTermName(source, 'source')
    assertTermName(target, 'target')
    const snapshot = this.current
    const { result, visitedTerms } = findPath(snapshot, source, target, maxDepth, this.settings)
    this.record({
      stage: 'traversal',
      operation: 'find-path',
      snapshotVersion: snapshot.version,
      depth: result.hops,
      visitedTerms,
      resultSize: result.path.length,
      truncated: result.truncated,
    })
    return result
  }

  /** Every term in insertion order. */
  listAllTerms(): AllTermsResult {
    const terms = this.current.terms.listAll()
    return { terms, totalCount: terms.length }
  }

  getStats(topN?: number): GraphStats {
    return computeGraphStats(this.current, topN)
  }

  // -------------------------------------------------------------------------
  // Reload
  // -------------------------------------------------------------------------

  /**
   * Replaces the whole graph with `batch`. A malformed batch leaves the
   * current snapshot in place and resolves to `{ ok: false }`.
   */
  reload(batch: unknown): Promise<ReloadResult> {
    return this.reloadFrom(async () => batch)
  }

  /**
   * Like {@link reload}, but obtains the batch from `load` once the reload
   * lock is held, so concurrent source reads cannot finish out of order.
   * A rejected `load` is reported the same way as a malformed batch.
   */
  reloadFrom(load: () => Promise<unknown>): Promise<ReloadResult> {
    return this.reloadLock.run(async () => {
      const startedAt = Date.now()
      const version = this.current.version + 1

      let next: GraphSnapshot
      try {
        next = buildSnapshot(await load(), version)
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err))
        console.error(
          `[glossary] graph-store: reload to v${version} failed, still serving v${this.current.version}:`,
          error.message
        )
        this.record(failedLoadMetrics(version, startedAt))
        return { ok: false, error }
      }

      this.current = next
      this.announce(next, startedAt)
      return {
        ok: true,
        version: next.version,
        termCount: next.terms.size,
        relationCount: next.relations.size,
      }
    })
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  private announce(snapshot: GraphSnapshot, startedAt: number): void {
    console.log(
      `[glossary] graph-store: serving v${snapshot.version} ` +
      `(${snapshot.terms.size} terms, ${snapshot.relations.size} relations)`
    )
    if (snapshot.danglingRelationCount > 0) {
      console.warn(
        `[glossary] graph-store: v${snapshot.version} has ${snapshot.danglingRelationCount} ` +
        'relation(s) pointing at unknown terms'
      )
    }
    this.record({
      stage: 'reload',
      ok: true,
      version: snapshot.version,
      termCount: snapshot.terms.size,
      relationCount: snapshot.relations.size,
      danglingRelationCount: snapshot.danglingRelationCount,
      durationMs: Date.now() - startedAt,
    })
  }

  private record(data: MetricData): void {
    if (!this.onMetric) return
    try {
      this.onMetric(createMetricEvent(data))
    } catch (err) {
      console.error('[glossary] graph-store: metric listener threw:', err)
    }
  }
}

function resolveTraversalSettings(overrides: Partial<TraversalSettings> = {}): TraversalSettings {
  const result = traversalSchema.safeParse(overrides)
  if (!result.success) {
    throw new ConfigValidationError(result.error)
  }
  return result.data
}

function failedLoadMetrics(version: number, startedAt: number): MetricData {
  return {
    stage: 'reload',
    ok: false,
    version,
    termCount: 0,
    relationCount: 0,
    danglingRelationCount: 0,
    durationMs: Date.now() - startedAt,
  }
}

/** @throws {InvalidArgumentError} unless `value` is a non-empty string. */
function assertTermName(value: unknown, argument: string): asserts value is string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidArgumentError(argument, `${argument} must be a non-empty term name`)
  }
}
