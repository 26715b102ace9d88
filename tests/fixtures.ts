import type { GraphBatch } from '../src/types.js'
import { buildSnapshot } from '../src/graph/snapshot.js'
import type { GraphSnapshot, TraversalSettings } from '../src/graph/traversal-types.js'

/**
 * terms {cat, animal, pet}
 *   cat --is-a--> animal
 *   cat --is-a--> pet
 */
export function petsBatch(): GraphBatch {
  return {
    terms: [
      { name: 'cat', definition: 'A small domesticated feline' },
      { name: 'animal', definition: 'A living organism that feeds on organic matter' },
      { name: 'pet', definition: 'An animal kept for companionship' },
    ],
    relations: [
      { source: 'cat', target: 'animal', type: 'is-a' },
      { source: 'cat', target: 'pet', type: 'is-a' },
    ],
  }
}

/**
 * Fixed letter graph, relations in insertion order:
 *   1. A --is-a--> B
 *   2. A --part-of--> C
 *   3. B --is-a--> D
 *   4. C --is-a--> D
 *   5. C --related-to--> E
 *   6. E --related-to--> A       (cycle A → C → E → A)
 *   7. A --related-to--> B       (second type for the same pair)
 *   8. A --is-a--> B             (duplicate of 1)
 *   9. D --mentions--> X         (X is not a term)
 * F is isolated.
 */
export function lettersBatch(): GraphBatch {
  return {
    terms: ['A', 'B', 'C', 'D', 'E', 'F'].map((name) => ({ name, definition: `Term ${name}` })),
    relations: [
      { source: 'A', target: 'B', type: 'is-a' },
      { source: 'A', target: 'C', type: 'part-of' },
      { source: 'B', target: 'D', type: 'is-a' },
      { source: 'C', target: 'D', type: 'is-a' },
      { source: 'C', target: 'E', type: 'related-to' },
      { source: 'E', target: 'A', type: 'related-to' },
      { source: 'A', target: 'B', type: 'related-to' },
      { source: 'A', target: 'B', type: 'is-a' },
      { source: 'D', target: 'X', type: 'mentions' },
    ],
  }
}

export function snapshotOf(batch: GraphBatch, version = 1): GraphSnapshot {
  return buildSnapshot(batch, version)
}

export function settings(overrides: Partial<TraversalSettings> = {}): TraversalSettings {
  return {
    defaultRelationDepth: 1,
    defaultPathDepth: 10,
    pathDirection: 'both',
    maxVisitedTerms: 10_000,
    ...overrides,
  }
}
