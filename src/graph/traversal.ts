/**
 * traversal.ts — Breadth-first traversals over a graph snapshot.
 *
 * Two primitives:
 * - `listRelations` expands outgoing relations from a term up to a depth.
 * - `findPath` finds a shortest (by hop count) path between two terms.
 *
 * Both read a single snapshot and never mutate it. Both track visited terms
 * explicitly, so cycles terminate without relying on the depth bound, and
 * both stop once `maxVisitedTerms` distinct terms have been visited.
 *
 * Ordering is fully determined by adjacency insertion order, so repeated
 * calls against the same snapshot return identical results.
 */

import { InvalidArgumentError } from '../types.js'
import type { PathResult, Relation, RelationsResult } from '../types.js'
import { relationKey } from './relation-index.js'
import type { RelationIndex } from './relation-index.js'
import type {
  GraphSnapshot,
  TraversalDirection,
  TraversalOutcome,
  TraversalSettings,
} from './traversal-types.js'

// ---------------------------------------------------------------------------
// Depth policy
// ---------------------------------------------------------------------------

/**
 * Resolves a caller-supplied depth. `undefined` and values `<= 0` fall back
 * to `fallback`; anything that is not an integer is a contract violation.
 *
 * @throws {InvalidArgumentError} for NaN, infinities and fractions.
 */
export function resolveDepth(maxDepth: number | undefined, fallback: number): number {
  if (maxDepth === undefined) return fallback
  if (!Number.isInteger(maxDepth)) {
    throw new InvalidArgumentError('maxDepth', `maxDepth must be an integer, got ${maxDepth}`)
  }
  return maxDepth <= 0 ? fallback : maxDepth
}

// ---------------------------------------------------------------------------
// Edge expansion policy
// ---------------------------------------------------------------------------

/**
 * Returns the terms path search may step to from `name`.
 *
 * Outgoing targets come first, then (for `'both'`) incoming sources, each in
 * adjacency insertion order. Repeats are left in; callers skip visited terms.
 */
export function expandNeighbors(
  relations: RelationIndex,
  name: string,
  direction: TraversalDirection
): string[] {
  const neighbors = relations.relationsFrom(name).map((r) => r.target)
  if (direction === 'both') {
    for (const r of relations.relationsTo(name)) neighbors.push(r.source)
  }
  return neighbors
}

// ---------------------------------------------------------------------------
// Relation listing
// ---------------------------------------------------------------------------

/**
 * Lists relations reachable from `startName` by following outgoing edges for
 * at most `maxDepth` hops.
 *
 * - Each (source, target, type) triple appears once.
 * - A term is expanded once; edges into an already-visited term are still
 *   reported.
 * - Order: BFS layer, then term discovery order, then adjacency order.
 * - Unknown start term → empty result.
 */
export function listRelations(
  snapshot: GraphSnapshot,
  startName: string,
  maxDepth: number | undefined,
  settings: TraversalSettings
): TraversalOutcome<RelationsResult> {
  const depth = resolveDepth(maxDepth, settings.defaultRelationDepth)

  if (!snapshot.terms.has(startName)) {
    return {
      result: { relations: [], totalCount: 0, depth, truncated: false },
      visitedTerms: 0,
    }
  }

  const reported = new Set<string>()
  const expanded = new Set<string>([startName])
  const relations: Relation[] = []
  let truncated = false
  let frontier: string[] = [startName]

  for (let level = 0; level < depth && frontier.length > 0; level++) {
    const willExpand = level + 1 < depth
    const next: string[] = []

    for (const name of frontier) {
      for (const relation of snapshot.relations.relationsFrom(name)) {
        const key = relationKey(relation)
        if (!reported.has(key)) {
          reported.add(key)
          relations.push(relation)
        }

        if (!willExpand || expanded.has(relation.target)) continue
        if (expanded.size >= settings.maxVisitedTerms) {
          truncated = true
          continue
        }
        expanded.add(relation.target)
        next.push(relation.target)
      }
    }

    frontier = next
  }

  return {
    result: { relations, totalCount: relations.length, depth, truncated },
    visitedTerms: expanded.size,
  }
}

// ---------------------------------------------------------------------------
// Path search
// ---------------------------------------------------------------------------

/**
 * Finds a shortest path from `source` to `target` of at most `maxDepth` hops.
 *
 * The first time the target is discovered decides the path; with a fixed
 * adjacency order that makes tie-breaks between equal-length paths stable.
 */
export function findPath(
  snapshot: GraphSnapshot,
  source: string,
  target: string,
  maxDepth: number | undefined,
  settings: TraversalSettings
): TraversalOutcome<PathResult> {
  const depth = resolveDepth(maxDepth, settings.defaultPathDepth)

  const missing = [...new Set([source, target])].filter((name) => !snapshot.terms.has(name))
  if (missing.length > 0) {
    return { result: noPath(missingTermsMessage(missing)), visitedTerms: 0 }
  }

  if (source === target) {
    return {
      result: {
        path: [source],
        exists: true,
        hops: 0,
        message: 'Source and target are the same term',
        truncated: false,
      },
      visitedTerms: 1,
    }
  }

  const parents = new Map<string, string>()
  const visited = new Set<string>([source])
  let frontier: string[] = [source]

  for (let level = 0; level < depth && frontier.length > 0; level++) {
    const willExpand = level + 1 < depth
    const next: string[] = []

    for (const current of frontier) {
      for (const neighbor of expandNeighbors(snapshot.relations, current, settings.pathDirection)) {
        if (visited.has(neighbor)) continue

        if (neighbor === target) {
          parents.set(neighbor, current)
          const path = reconstructPath(parents, source, target)
          return {
            result: {
              path,
              exists: true,
              hops: path.length - 1,
              message: `Path found (${hopsLabel(path.length - 1)})`,
              truncated: false,
            },
            visitedTerms: visited.size + 1,
          }
        }

        if (!willExpand) continue
        if (visited.size >= settings.maxVisitedTerms) {
          return {
            result: {
              ...noPath(
                `Search stopped after visiting ${visited.size} terms without reaching "${target}"`
              ),
              truncated: true,
            },
            visitedTerms: visited.size,
          }
        }
        visited.add(neighbor)
        parents.set(neighbor, current)
        next.push(neighbor)
      }
    }

    frontier = next
  }

  return {
    result: noPath(`No path from "${source}" to "${target}" within ${hopsLabel(depth)}`),
    visitedTerms: visited.size,
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function noPath(message: string): PathResult {
  return { path: [], exists: false, hops: 0, message, truncated: false }
}

function hopsLabel(count: number): string {
  return count === 1 ? '1 hop' : `${count} hops`
}

function missingTermsMessage(missing: readonly string[]): string {
  const quoted = missing.map((name) => `"${name}"`).join(', ')
  return missing.length === 1 ? `Term not found: ${quoted}` : `Terms not found: ${quoted}`
}

function reconstructPath(
  parents: ReadonlyMap<string, string>,
  source: string,
  target: string
): string[] {
  const path = [target]
  let current = target
  while (current !== source) {
    const parent = parents.get(current)
    if (parent === undefined) {
      throw new Error(`[glossary] Internal: broken parent chain at "${current}"`)
    }
    path.push(parent)
    current = parent
  }
  return path.reverse()
}
