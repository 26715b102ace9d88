import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { GraphStore, DEFAULT_TRAVERSAL_SETTINGS } from '../../src/graph/graph-store.js'
import { GraphLoadError, InvalidArgumentError } from '../../src/types.js'
import { ConfigValidationError } from '../../src/config.js'
import { TermIndex } from '../../src/graph/term-index.js'
import type { MetricEvent } from '../../src/metrics/types.js'
import { lettersBatch, petsBatch } from '../fixtures.js'

let logSpy: ReturnType<typeof vi.spyOn>
let warnSpy: ReturnType<typeof vi.spyOn>
let errorSpy: ReturnType<typeof vi.spyOn>

beforeEach(() => {
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
  warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(() => {
  logSpy.mockRestore()
  warnSpy.mockRestore()
  errorSpy.mockRestore()
})

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

describe('GraphStore.fromBatch', () => {
  it('starts at version 1 and logs the loaded counts', () => {
    const store = GraphStore.fromBatch(petsBatch())

    expect(store.version).toBe(1)
    expect(logSpy).toHaveBeenCalledWith('[glossary] graph-store: serving v1 (3 terms, 2 relations)')
  })

  it('warns once when relations point at unknown terms', () => {
    GraphStore.fromBatch(lettersBatch())

    expect(warnSpy).toHaveBeenCalledTimes(1)
    expect(warnSpy).toHaveBeenCalledWith(
      '[glossary] graph-store: v1 has 1 relation(s) pointing at unknown terms'
    )
  })

  it('malformed batch → GraphLoadError with field paths', () => {
    const build = () =>
      GraphStore.fromBatch({ terms: [{ name: '', definition: 'x' }], relations: [] })

    expect(build).toThrow(GraphLoadError)
    expect(build).toThrow('  terms[0].name: term name must not be empty')
  })

  it('missing arrays are rejected rather than treated as empty', () => {
    expect(() => GraphStore.fromBatch({ terms: [] })).toThrow(GraphLoadError)
  })

  it('uses the default traversal settings when none are given', () => {
    const store = GraphStore.fromBatch(lettersBatch())

    expect(store.listRelations('A').depth).toBe(DEFAULT_TRAVERSAL_SETTINGS.defaultRelationDepth)
  })

  it('an explicit undefined override keeps the default', () => {
    const store = GraphStore.fromBatch(petsBatch(), {
      traversal: { defaultPathDepth: undefined, defaultRelationDepth: undefined },
    })

    expect(store.findPath('animal', 'pet')).toMatchObject({
      path: ['animal', 'cat', 'pet'],
      exists: true,
    })
    expect(store.listRelations('cat').depth).toBe(1)
  })

  it('out-of-range overrides are rejected before anything is loaded', () => {
    const build = () => GraphStore.fromBatch(petsBatch(), { traversal: { defaultPathDepth: 0 } })

    expect(build).toThrow(ConfigValidationError)
    expect(build).toThrow('  defaultPathDepth: traversal.defaultPathDepth must be at least 1')
    expect(logSpy).not.toHaveBeenCalled()
  })
})

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

describe('GraphStore queries', () => {
  it('getTerm: every inserted term is found with its exact definition', () => {
    const batch = petsBatch()
    const store = GraphStore.fromBatch(batch)

    for (const term of batch.terms) {
      expect(store.getTerm(term.name)).toEqual({ found: true, term })
    }
  })

  it('getTerm: names that were never inserted are not found', () => {
    const store = GraphStore.fromBatch(petsBatch())

    expect(store.getTerm('dog')).toEqual({ found: false, term: null })
    expect(store.getTerm('Cat')).toEqual({ found: false, term: null })
  })

  it('empty term names violate the contract', () => {
    const store = GraphStore.fromBatch(petsBatch())

    expect(() => store.getTerm('')).toThrow(InvalidArgumentError)
    expect(() => store.listRelations('')).toThrow('name must be a non-empty term name')
    expect(() => store.findPath('cat', '')).toThrow('target must be a non-empty term name')
  })

  it('fractional depth violates the contract', () => {
    const store = GraphStore.fromBatch(petsBatch())

    expect(() => store.listRelations('cat', 0.5)).toThrow(InvalidArgumentError)
    expect(() => store.findPath('cat', 'pet', 2.5)).toThrow(InvalidArgumentError)
  })

  it('relationsFrom returns direct outgoing relations', () => {
    const store = GraphStore.fromBatch(petsBatch())

    expect(store.relationsFrom('cat')).toHaveLength(2)
    expect(store.relationsFrom('animal')).toEqual([])
  })

  it('listRelations(T, 0) equals listRelations(T, 1)', () => {
    const store = GraphStore.fromBatch(lettersBatch())

    expect(store.listRelations('A', 0)).toEqual(store.listRelations('A', 1))
  })

  it('applies traversal overrides', () => {
    const store = GraphStore.fromBatch(petsBatch(), { traversal: { pathDirection: 'forward' } })

    expect(store.findPath('animal', 'pet', 3).exists).toBe(false)
  })

  it('queries are idempotent between reloads', () => {
    const store = GraphStore.fromBatch(lettersBatch())

    expect(store.listRelations('A', 3)).toEqual(store.listRelations('A', 3))
    expect(store.findPath('D', 'A', 4)).toEqual(store.findPath('D', 'A', 4))
    expect(store.listAllTerms()).toEqual(store.listAllTerms())
  })

  it('pets example end to end', () => {
    const store = GraphStore.fromBatch(petsBatch())

    expect(store.listRelations('cat', 1).totalCount).toBe(2)
    expect(store.findPath('animal', 'pet', 3).path).toEqual(['animal', 'cat', 'pet'])
  })

  it('listAllTerms returns every term in insertion order with a count', () => {
    const store = GraphStore.fromBatch(petsBatch())

    const result = store.listAllTerms()
    expect(result.totalCount).toBe(3)
    expect(result.terms.map((t) => t.name)).toEqual(['cat', 'animal', 'pet'])
  })

  it('getStats summarises the current snapshot', () => {
    const store = GraphStore.fromBatch(petsBatch())

    const stats = store.getStats()
    expect(stats.termCount).toBe(3)
    expect(stats.relationCount).toBe(2)
    expect(stats.componentCount).toBe(1)
  })
})

// ---------------------------------------------------------------------------
// Reload
// ---------------------------------------------------------------------------

describe('GraphStore.reload', () => {
  it('replaces every prior term and relation', async () => {
    const store = GraphStore.fromBatch(petsBatch())

    const result = await store.reload(lettersBatch())

    expect(result).toEqual({ ok: true, version: 2, termCount: 6, relationCount: 9 })
    expect(store.version).toBe(2)
    expect(store.getTerm('cat').found).toBe(false)
    expect(store.listRelations('cat', 1).totalCount).toBe(0)
    expect(store.findPath('animal', 'pet', 3).message).toBe('Terms not found: "animal", "pet"')
    expect(store.getTerm('A').found).toBe(true)
  })

  it('malformed batch → ok: false and the previous snapshot keeps serving', async () => {
    const store = GraphStore.fromBatch(petsBatch())

    const result = await store.reload({
      terms: [{ name: 'dog', definition: 'd' }],
      relations: [{ source: 'dog', target: 'cat', type: '' }],
    })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(GraphLoadError)
      expect(result.error.message).toContain('relations[0].type: relation type must not be empty')
    }
    expect(store.version).toBe(1)
    expect(store.getTerm('cat').found).toBe(true)
    expect(store.getTerm('dog').found).toBe(false)
    expect(store.findPath('animal', 'pet', 3).exists).toBe(true)
    expect(errorSpy).toHaveBeenCalledTimes(1)
  })

  it('a rejected loader is reported as a failed reload', async () => {
    const store = GraphStore.fromBatch(petsBatch())

    const result = await store.reloadFrom(async () => {
      throw new Error('source unavailable')
    })

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('source unavailable')
    expect(store.getTerm('cat').found).toBe(true)
  })

  it('a snapshot taken before a reload keeps answering from the old graph', async () => {
    const store = GraphStore.fromBatch(petsBatch())
    const before = store.snapshot()

    await store.reload(lettersBatch())

    expect(before.version).toBe(1)
    expect(before.terms.has('cat')).toBe(true)
    expect(store.snapshot().terms.has('cat')).toBe(false)
  })

  it('the served snapshot cannot be changed through its indexes', () => {
    const store = GraphStore.fromBatch(petsBatch())
    const { terms, relations } = store.snapshot()

    expect(terms).toBeInstanceOf(TermIndex)
    if (terms instanceof TermIndex) {
      expect(terms.isFrozen).toBe(true)
      expect(() => terms.put({ name: 'ghost', definition: 'x' })).toThrow(
        '[glossary] TermIndex is frozen, cannot put "ghost"'
      )
    }
    expect(Object.isFrozen(terms.get('cat'))).toBe(true)
    expect(Object.isFrozen(relations.relationsFrom('cat'))).toBe(true)
    expect(Object.isFrozen(relations.all())).toBe(true)
    expect(store.getTerm('ghost').found).toBe(false)
    expect(store.listAllTerms().totalCount).toBe(3)
  })

  it('concurrent reloads apply in call order', async () => {
    const store = GraphStore.fromBatch(petsBatch())

    const [first, second] = await Promise.all([
      store.reload(lettersBatch()),
      store.reload({ terms: [{ name: 'solo', definition: '' }], relations: [] }),
    ])

    expect(first.ok && first.version).toBe(2)
    expect(second.ok && second.version).toBe(3)
    expect(store.listAllTerms().terms.map((t) => t.name)).toEqual(['solo'])
  })

  it('version numbers are not consumed by failed reloads', async () => {
    const store = GraphStore.fromBatch(petsBatch())

    await store.reload(null)
    const result = await store.reload(lettersBatch())

    expect(result.ok && result.version).toBe(2)
  })
})

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

describe('GraphStore metrics', () => {
  it('emits a reload event on construction and a traversal event per query', () => {
    const events: MetricEvent[] = []
    const store = GraphStore.fromBatch(petsBatch(), { onMetric: (e) => events.push(e) })

    store.listRelations('cat', 1)
    store.findPath('animal', 'pet', 3)

    expect(events.map((e) => e.stage)).toEqual(['reload', 'traversal', 'traversal'])
    expect(events[0]?.data).toMatchObject({
      stage: 'reload',
      ok: true,
      version: 1,
      termCount: 3,
      relationCount: 2,
      danglingRelationCount: 0,
    })
    expect(events[1]?.data).toMatchObject({
      stage: 'traversal',
      operation: 'list-relations',
      snapshotVersion: 1,
      depth: 1,
      resultSize: 2,
      truncated: false,
    })
    expect(events[2]?.data).toMatchObject({
      stage: 'traversal',
      operation: 'find-path',
      depth: 2,
      resultSize: 3,
    })
  })

  it('emits a failed reload event when construction fails', () => {
    const onMetric = vi.fn()

    expect(() => GraphStore.fromBatch({ terms: 1 }, { onMetric })).toThrow(GraphLoadError)
    expect(onMetric).toHaveBeenCalledTimes(1)
    expect(onMetric.mock.calls[0]?.[0]).toMatchObject({ stage: 'reload', data: { ok: false, version: 1 } })
  })

  it('a throwing metric listener does not break queries', () => {
    const store = GraphStore.fromBatch(petsBatch(), {
      onMetric: () => {
        throw new Error('listener down')
      },
    })

    expect(store.listRelations('cat', 1).totalCount).toBe(2)
    expect(errorSpy).toHaveBeenCalled()
  })
})
