/**
 * glossary-service.ts — Request/response facade over the graph store.
 *
 * Turns transport-level messages (`TermRequest`, `RelationsRequest`,
 * `PathRequest`, an empty request, and a reload batch) into store calls and
 * store results back into response messages. Transport-agnostic: whatever
 * server sits in front only has to move these plain objects.
 *
 * Not-found outcomes are ordinary responses. Malformed requests throw
 * `GlossaryRequestError` with code `INVALID_ARGUMENT`; anything unexpected
 * from the store is wrapped with code `INTERNAL`.
 */

import { z } from 'zod'
import { errorMessage, invalidMessage } from '../error-utils.js'
import type { GraphStore } from '../graph/graph-store.js'
import { InvalidArgumentError } from '../types.js'
import type { Relation, Term } from '../types.js'

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const termNameField = z.string().min(1, 'must not be empty')

/** Absent, 0 or negative → the store's configured default depth. */
const maxDepthField = z.number().int('must be an integer').optional()

const termRequestSchema = z.object({ termName: termNameField })

const relationsRequestSchema = z.object({
  termName: termNameField,
  maxDepth: maxDepthField,
})

const pathRequestSchema = z.object({
  sourceTerm: termNameField,
  targetTerm: termNameField,
  maxDepth: maxDepthField,
})

// ---------------------------------------------------------------------------
// Message types
// ---------------------------------------------------------------------------

export type TermRequest = z.input<typeof termRequestSchema>
export type RelationsRequest = z.input<typeof relationsRequestSchema>
export type PathRequest = z.input<typeof pathRequestSchema>

export interface TermMessage {
  readonly name: string
  readonly definition: string
}

export interface RelationMessage {
  readonly sourceTerm: string
  readonly targetTerm: string
  readonly relationType: string
}

export interface TermResponse {
  /** Empty name and definition when `found` is false. */
  readonly term: TermMessage
  readonly found: boolean
}

export interface RelationsResponse {
  readonly relations: readonly RelationMessage[]
  readonly totalCount: number
}

export interface PathResponse {
  readonly path: readonly string[]
  readonly pathExists: boolean
  readonly message: string
}

export interface AllTermsResponse {
  readonly terms: readonly TermMessage[]
  readonly totalCount: number
}

export interface ReloadRequest {
  readonly terms: readonly TermMessage[]
  readonly relations: readonly RelationMessage[]
}

export interface ReloadResponse {
  readonly success: boolean
  readonly message: string
  readonly termCount: number
  readonly relationCount: number
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type GlossaryErrorCode = 'INVALID_ARGUMENT' | 'INTERNAL'

export class GlossaryRequestError extends Error {
  readonly code: GlossaryErrorCode

  constructor(code: GlossaryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'GlossaryRequestError'
    this.code = code
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

const EMPTY_TERM: TermMessage = Object.freeze({ name: '', definition: '' })

export class GlossaryService {
  private readonly store: GraphStore

  constructor(store: GraphStore) {
    this.store = store
  }

  getTerm(request: TermRequest): TermResponse {
    const { termName } = validate('TermRequest', termRequestSchema, request)
    return this.call(() => {
      const lookup = this.store.getTerm(termName)
      return lookup.found
        ? { term: toTermMessage(lookup.term), found: true }
        : { term: EMPTY_TERM, found: false }
    })
  }

  getTermRelations(request: RelationsRequest): RelationsResponse {
    const { termName, maxDepth } = validate('RelationsRequest', relationsRequestSchema, request)
    return this.call(() => {
      const result = this.store.listRelations(termName, maxDepth)
      return {
        relations: result.relations.map(toRelationMessage),
        totalCount: result.totalCount,
      }
    })
  }

  findPath(request: PathRequest): PathResponse {
    const { sourceTerm, targetTerm, maxDepth } = validate('PathRequest', pathRequestSchema, request)
    return this.call(() => {
      const result = this.store.findPath(sourceTerm, targetTerm, maxDepth)
      return { path: result.path, pathExists: result.exists, message: result.message }
    })
  }

  getAllTerms(): AllTermsResponse {
    return this.call(() => {
      const result = this.store.listAllTerms()
      return { terms: result.terms.map(toTermMessage), totalCount: result.totalCount }
    })
  }

  /**
   * Replaces the served graph. Validation of the batch happens in the store,
   * so a rejected batch is reported as `success: false` rather than thrown.
   */
  async reloadGraph(request: ReloadRequest): Promise<ReloadResponse> {
    const batch = {
      terms: request.terms,
      relations: request.relations.map((r) => ({
        source: r.sourceTerm,
        target: r.targetTerm,
        type: r.relationType,
      })),
    }
    const result = await this.store.reload(batch)
    if (!result.ok) {
      return { success: false, message: result.error.message, termCount: 0, relationCount: 0 }
    }
    return {
      success: true,
      message: `Loaded graph v${result.version}`,
      termCount: result.termCount,
      relationCount: result.relationCount,
    }
  }

  private call<T>(fn: () => T): T {
    try {
      return fn()
    } catch (err) {
      if (err instanceof InvalidArgumentError) {
        throw new GlossaryRequestError('INVALID_ARGUMENT', err.message, { cause: err })
      }
      console.error('[glossary] service: query failed:', err)
      throw new GlossaryRequestError(
        'INTERNAL',
        `Internal error: ${errorMessage(err)}`,
        { cause: err }
      )
    }
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function validate<T>(messageName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, request: unknown): T {
  const result = schema.safeParse(request)
  if (!result.success) {
    throw new GlossaryRequestError(
      'INVALID_ARGUMENT',
      invalidMessage(messageName, result.error.issues),
      { cause: result.error }
    )
  }
  return result.data
}

function toTermMessage(term: Term): TermMessage {
  return { name: term.name, definition: term.definition }
}

function toRelationMessage(relation: Relation): RelationMessage {
  return {
    sourceTerm: relation.source,
    targetTerm: relation.target,
    relationType: relation.type,
  }
}
