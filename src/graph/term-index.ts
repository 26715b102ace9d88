/**
 * term-index.ts — Name → term lookup, the source of truth for node existence.
 *
 * Backed by a `Map`, so enumeration follows insertion order. Overwriting a
 * name keeps its original position. Once frozen, an index rejects writes;
 * snapshots only ever hold frozen indexes.
 */

import type { Term } from '../types.js'

/** The lookup surface a snapshot exposes. */
export interface ReadonlyTermIndex {
  readonly size: number
  get(name: string): Term | null
  has(name: string): boolean
  listAll(): readonly Term[]
}

export class TermIndex implements ReadonlyTermIndex {
  private readonly terms = new Map<string, Term>()
  private frozen = false

  /** Builds an index from `terms`; later duplicates overwrite earlier ones. */
  static from(terms: Iterable<Term>): TermIndex {
    const index = new TermIndex()
    index.bulkLoad(terms)
    return index
  }

  get size(): number {
    return this.terms.size
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  /** Exact, case-sensitive lookup. Unknown names → null. */
  get(name: string): Term | null {
    return this.terms.get(name) ?? null
  }

  has(name: string): boolean {
    return this.terms.has(name)
  }

  /** Every term in insertion order. */
  listAll(): readonly Term[] {
    return [...this.terms.values()]
  }

  /** @throws once the index is frozen. */
  put(term: Term): void {
    if (this.frozen) {
      throw new Error(`[glossary] TermIndex is frozen, cannot put "${term.name}"`)
    }
    this.terms.set(term.name, Object.freeze({ name: term.name, definition: term.definition }))
  }

  bulkLoad(terms: Iterable<Term>): void {
    for (const term of terms) this.put(term)
  }

  /** Rejects every later write and returns the read-only view. */
  freeze(): ReadonlyTermIndex {
    this.frozen = true
    return this
  }
}
