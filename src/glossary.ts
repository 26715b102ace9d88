/**
 * glossary.ts — Wires the CSV source, graph store and query facade together.
 */

import { resolve } from 'node:path'
import type { GlossaryConfig } from './config.js'
import { GraphStore } from './graph/graph-store.js'
import { createMetricSink } from './metrics/sink.js'
import { GlossaryService } from './service/glossary-service.js'
import { loadGraphBatch } from './source/csv-source.js'
import type { CsvSourceFiles } from './source/csv-source.js'
import type { ReloadResult } from './types.js'

export interface Glossary {
  readonly store: GraphStore
  readonly service: GlossaryService
  /** Absolute paths the store was loaded from. */
  readonly files: CsvSourceFiles
}

export interface CreateGlossaryOptions {
  /** Directory that relative `data.*File` paths are resolved against. Defaults to cwd. */
  readonly baseDir?: string
}

/** Resolves the configured CSV paths against `baseDir`. */
export function resolveSourceFiles(config: GlossaryConfig, baseDir: string = process.cwd()): CsvSourceFiles {
  return {
    termsFile: resolve(baseDir, config.data.termsFile),
    linksFile: resolve(baseDir, config.data.linksFile),
  }
}

/**
 * Loads the configured CSV files and builds a ready-to-query glossary.
 *
 * @throws {GraphSourceError} if either file is missing or malformed.
 * @throws {GraphLoadError} if the rows do not form a valid batch.
 */
export async function createGlossary(
  config: GlossaryConfig,
  options: CreateGlossaryOptions = {}
): Promise<Glossary> {
  const files = resolveSourceFiles(config, options.baseDir)
  const batch = await loadGraphBatch(files)

  const store = GraphStore.fromBatch(batch, {
    traversal: config.traversal,
    onMetric: config.metrics.enabled
      ? createMetricSink({ filePath: config.metrics.filePath })
      : undefined,
  })

  return { store, service: new GlossaryService(store), files }
}

/**
 * Re-reads the source files and swaps them in. On any failure the glossary
 * keeps serving its previous snapshot.
 */
export function reloadGlossary(glossary: Glossary): Promise<ReloadResult> {
  return glossary.store.reloadFrom(() => loadGraphBatch(glossary.files))
}
