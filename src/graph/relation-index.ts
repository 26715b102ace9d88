/**
 * relation-index.ts — Forward and backward adjacency over relation triples.
 *
 * Both adjacency lists keep the order relations were supplied in; traversal
 * tie-breaks depend on it. An index is complete once `from` returns: stored
 * relations and adjacency lists are frozen.
 */

import type { Relation } from '../types.js'

const EMPTY: readonly Relation[] = Object.freeze([])

/** Identity of a relation triple, used to report each triple once. */
export function relationKey(relation: Relation): string {
  return JSON.stringify([relation.source, relation.target, relation.type])
}

export class RelationIndex {
  private readonly forward = new Map<string, Relation[]>()
  private readonly backward = new Map<string, Relation[]>()
  private readonly relations: Relation[] = []

  static from(relations: Iterable<Relation>): RelationIndex {
    const index = new RelationIndex()
    for (const relation of relations) index.add(relation)
    index.seal()
    return index
  }

  get size(): number {
    return this.relations.length
  }

  /** Every relation in insertion order, duplicates included. */
  all(): readonly Relation[] {
    return this.relations
  }

  /** Direct outgoing relations of `name`. Unknown names → empty. */
  relationsFrom(name: string): readonly Relation[] {
    return this.forward.get(name) ?? EMPTY
  }

  /** Direct incoming relations of `name`. Unknown names → empty. */
  relationsTo(name: string): readonly Relation[] {
    return this.backward.get(name) ?? EMPTY
  }

  private add(relation: Relation): void {
    const stored: Relation = Object.freeze({
      source: relation.source,
      target: relation.target,
      type: relation.type,
    })
    this.relations.push(stored)
    appendTo(this.forward, stored.source, stored)
    appendTo(this.backward, stored.target, stored)
  }

  private seal(): void {
    Object.freeze(this.relations)
    for (const list of this.forward.values()) Object.freeze(list)
    for (const list of this.backward.values()) Object.freeze(list)
  }
}

function appendTo(map: Map<string, Relation[]>, key: string, relation: Relation): void {
  const list = map.get(key)
  if (list) {
    list.push(relation)
  } else {
    map.set(key, [relation])
  }
}
