/**
 * snapshot.ts — Validates a graph batch and builds an immutable snapshot.
 *
 * Building never touches the snapshot currently being served; the store swaps
 * references only after this returns.
 */

import { z } from 'zod'
import { invalidMessage } from '../error-utils.js'
import { GraphLoadError } from '../types.js'
import type { GraphBatch } from '../types.js'
import { RelationIndex } from './relation-index.js'
import { TermIndex } from './term-index.js'
import type { GraphSnapshot } from './traversal-types.js'

// ---------------------------------------------------------------------------
// Batch schema
// ---------------------------------------------------------------------------

const termSchema = z.object({
  name: z.string().min(1, 'term name must not be empty'),
  definition: z.string(),
}).strip()

const relationSchema = z.object({
  source: z.string().min(1, 'relation source must not be empty'),
  target: z.string().min(1, 'relation target must not be empty'),
  type: z.string().min(1, 'relation type must not be empty'),
}).strip()

export const graphBatchSchema = z.object({
  terms: z.array(termSchema),
  relations: z.array(relationSchema),
}).strip()

// ---------------------------------------------------------------------------
// Build
// ---------------------------------------------------------------------------

/**
 * Validates `raw` as a {@link GraphBatch} and indexes it.
 *
 * @throws {GraphLoadError} when the batch is malformed; nothing is built.
 */
export function buildSnapshot(raw: unknown, version: number): GraphSnapshot {
  const parsed = graphBatchSchema.safeParse(raw)
  if (!parsed.success) {
    throw new GraphLoadError(
      invalidMessage('Graph batch', parsed.error.issues),
      parsed.error.issues,
      { cause: parsed.error },
    )
  }

  const batch: GraphBatch = parsed.data
  const terms = TermIndex.from(batch.terms).freeze()
  const relations = RelationIndex.from(batch.relations)
  const danglingRelationCount = relations
    .all()
    .filter((r) => !terms.has(r.source) || !terms.has(r.target)).length

  return Object.freeze({
    version,
    loadedAt: new Date().toISOString(),
    terms,
    relations,
    danglingRelationCount,
  })
}

