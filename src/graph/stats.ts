/**
 * stats.ts — Summary statistics for a graph snapshot.
 *
 * Degree counts every relation incident to a term (in + out), parallel
 * relations included. Components are computed over the undirected graph whose
 * nodes are all terms plus any dangling relation endpoints.
 */

import { expandNeighbors } from './traversal.js'
import type { GraphSnapshot } from './traversal-types.js'

export interface ConnectedTerm {
  readonly name: string
  readonly degree: number
}

export interface GraphStats {
  readonly version: number
  readonly termCount: number
  readonly relationCount: number
  readonly danglingRelationCount: number
  readonly averageDegree: number
  /** Relation type → count, in order of first appearance. */
  readonly relationTypes: ReadonlyMap<string, number>
  readonly topConnected: readonly ConnectedTerm[]
  readonly componentCount: number
  readonly largestComponentSize: number
}

const DEFAULT_TOP_N = 5

export function computeGraphStats(snapshot: GraphSnapshot, topN: number = DEFAULT_TOP_N): GraphStats {
  const terms = snapshot.terms.listAll()
  const relations = snapshot.relations.all()

  const relationTypes = new Map<string, number>()
  const degree = new Map<string, number>(terms.map((t) => [t.name, 0]))
  for (const r of relations) {
    relationTypes.set(r.type, (relationTypes.get(r.type) ?? 0) + 1)
    if (degree.has(r.source)) degree.set(r.source, (degree.get(r.source) ?? 0) + 1)
    if (degree.has(r.target)) degree.set(r.target, (degree.get(r.target) ?? 0) + 1)
  }

  // Array.prototype.sort is stable, so equal degrees keep insertion order.
  const topConnected = [...degree.entries()]
    .map(([name, d]) => ({ name, degree: d }))
    .sort((a, b) => b.degree - a.degree)
    .slice(0, Math.max(0, topN))

  const components = countComponents(snapshot)

  return {
    version: snapshot.version,
    termCount: terms.length,
    relationCount: relations.length,
    danglingRelationCount: snapshot.danglingRelationCount,
    averageDegree: terms.length === 0 ? 0 : (2 * relations.length) / terms.length,
    relationTypes,
    topConnected,
    componentCount: components.count,
    largestComponentSize: components.largest,
  }
}

function countComponents(snapshot: GraphSnapshot): { count: number; largest: number } {
  const nodes = new Set<string>(snapshot.terms.listAll().map((t) => t.name))
  for (const r of snapshot.relations.all()) {
    nodes.add(r.source)
    nodes.add(r.target)
  }

  const seen = new Set<string>()
  let count = 0
  let largest = 0

  for (const start of nodes) {
    if (seen.has(start)) continue
    count++
    seen.add(start)
    const queue = [start]
    let size = 0
    for (let head = 0; head < queue.length; head++) {
      const current = queue[head]
      if (current === undefined) break
      size++
      for (const n of expandNeighbors(snapshot.relations, current, 'both')) {
        if (seen.has(n)) continue
        seen.add(n)
        queue.push(n)
      }
    }
    largest = Math.max(largest, size)
  }

  return { count, largest }
}
