/**
 * types.ts — Core domain types for the glossary graph.
 *
 * A glossary is a set of terms (name → definition) joined by typed, directed
 * relations. Relation types are open labels: the engine never enumerates them.
 */

import type { z } from 'zod'

// ---------------------------------------------------------------------------
// Terms and relations
// ---------------------------------------------------------------------------

/** A named concept. Names are case-sensitive and unique within a snapshot. */
export interface Term {
  readonly name: string
  readonly definition: string
}

/** A directed, typed edge `source --[type]--> target`. */
export interface Relation {
  readonly source: string
  readonly target: string
  readonly type: string
}

/** The unit of loading: everything a snapshot is built from. */
export interface GraphBatch {
  readonly terms: readonly Term[]
  readonly relations: readonly Relation[]
}

// ---------------------------------------------------------------------------
// Query results
// ---------------------------------------------------------------------------

/** Result of a term lookup. Absence is a normal outcome, not an error. */
export type TermLookup =
  | { readonly found: true; readonly term: Term }
  | { readonly found: false; readonly term: null }

export interface RelationsResult {
  readonly relations: readonly Relation[]
  readonly totalCount: number
  /** Effective depth after the `maxDepth <= 0` default was applied. */
  readonly depth: number
  /** True when the visit ceiling stopped the expansion early. */
  readonly truncated: boolean
}

export interface PathResult {
  /** Term names from source to target inclusive; empty when no path exists. */
  readonly path: readonly string[]
  readonly exists: boolean
  readonly hops: number
  readonly message: string
  readonly truncated: boolean
}

export interface AllTermsResult {
  readonly terms: readonly Term[]
  readonly totalCount: number
}

export type ReloadResult =
  | {
      readonly ok: true
      readonly version: number
      readonly termCount: number
      readonly relationCount: number
    }
  | { readonly ok: false; readonly error: Error }

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a caller breaks an operation's input contract: an empty term
 * name, or a depth that is not a finite integer.
 */
export class InvalidArgumentError extends Error {
  readonly argument: string

  constructor(argument: string, message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
    this.argument = argument
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Thrown when a batch cannot be turned into a snapshot. The store that was
 * serving before the failed load keeps serving.
 */
export class GraphLoadError extends Error {
  readonly issues: readonly z.ZodIssue[]

  constructor(message: string, issues: readonly z.ZodIssue[] = [], options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'GraphLoadError'
    this.issues = issues
    Object.setPrototypeOf(this, new.target.prototype)
  }
}
