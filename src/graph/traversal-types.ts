/**
 * Types for the traversal engine.
 */

import type { RelationIndex } from './relation-index.js'
import type { ReadonlyTermIndex } from './term-index.js'

/**
 * Which edges path search may cross.
 * - `'both'`: a relation connects its endpoints in either direction
 * - `'forward'`: only source → target
 */
export type TraversalDirection = 'forward' | 'both'

/** Tuning shared by every traversal; mirrors the `traversal` config block. */
export interface TraversalSettings {
  /** Depth used by relation listing when the caller passes `maxDepth <= 0`. */
  readonly defaultRelationDepth: number
  /** Depth used by path search when the caller passes `maxDepth <= 0`. */
  readonly defaultPathDepth: number
  readonly pathDirection: TraversalDirection
  /** Upper bound on distinct terms a single traversal may visit. */
  readonly maxVisitedTerms: number
}

/** Immutable view of both indexes as of one load. */
export interface GraphSnapshot {
  readonly version: number
  readonly loadedAt: string
  readonly terms: ReadonlyTermIndex
  readonly relations: RelationIndex
  /** Relations with at least one endpoint that is not an indexed term. */
  readonly danglingRelationCount: number
}

/** A traversal result plus the number of distinct terms it touched. */
export interface TraversalOutcome<T> {
  readonly result: T
  readonly visitedTerms: number
}
