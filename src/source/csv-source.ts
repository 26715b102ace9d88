/**
 * csv-source.ts — Reads a glossary graph batch from two CSV files.
 *
 *   terms.csv  header `term,definition`
 *   links.csv  header `source,target,relation`
 *
 * Values are trimmed and blank lines skipped. Extra columns are ignored.
 */

import { parse } from 'csv-parse/sync'
import { z } from 'zod'
import { errorMessage, formatZodErrors } from '../error-utils.js'
import type { GraphBatch, Relation, Term } from '../types.js'
import { readFileOrNull } from '../utils/fs.js'

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Thrown when a source file is missing, unreadable or holds an invalid row. */
export class GraphSourceError extends Error {
  readonly filePath: string
  /** 1-based data row (header excluded), when the failure is row-specific. */
  readonly row: number | null

  constructor(filePath: string, message: string, options: { row?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'GraphSourceError'
    this.filePath = filePath
    this.row = options.row ?? null
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// ---------------------------------------------------------------------------
// Row schemas
// ---------------------------------------------------------------------------

const termRowSchema = z.object({
  term: z.string().min(1, 'term must not be empty'),
  definition: z.string(),
})

const linkRowSchema = z.object({
  source: z.string().min(1, 'source must not be empty'),
  target: z.string().min(1, 'target must not be empty'),
  relation: z.string().min(1, 'relation must not be empty'),
})

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface CsvSourceFiles {
  readonly termsFile: string
  readonly linksFile: string
}

/**
 * Loads both files into a {@link GraphBatch}.
 *
 * @throws {GraphSourceError} naming the file (and row) that failed.
 */
export async function loadGraphBatch(files: CsvSourceFiles): Promise<GraphBatch> {
  const [termRows, linkRows] = await Promise.all([
    readRows(files.termsFile, termRowSchema),
    readRows(files.linksFile, linkRowSchema),
  ])

  const terms: Term[] = termRows.map((row) => ({ name: row.term, definition: row.definition }))
  const relations: Relation[] = linkRows.map((row) => ({
    source: row.source,
    target: row.target,
    type: row.relation,
  }))

  console.log(
    `[glossary] csv-source: read ${terms.length} terms from ${files.termsFile}, ` +
    `${relations.length} relations from ${files.linksFile}`
  )
  return { terms, relations }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

async function readRows<T>(filePath: string, schema: z.ZodType<T>): Promise<T[]> {
  let raw: string | null
  try {
    raw = await readFileOrNull(filePath)
  } catch (err) {
    throw new GraphSourceError(filePath, `Could not read ${filePath}: ${errorMessage(err)}`, { cause: err })
  }
  if (raw === null) {
    throw new GraphSourceError(filePath, `Graph source file not found: ${filePath}`)
  }

  let records: unknown
  try {
    records = parse(raw, { columns: true, skip_empty_lines: true, trim: true, bom: true })
  } catch (err) {
    throw new GraphSourceError(
      filePath,
      `Malformed CSV in ${filePath}: ${errorMessage(err)}`,
      { cause: err }
    )
  }

  if (!Array.isArray(records)) {
    throw new GraphSourceError(filePath, `Malformed CSV in ${filePath}: expected a list of rows`)
  }

  return records.map((record: unknown, i) => {
    const result = schema.safeParse(record)
    if (!result.success) {
      throw new GraphSourceError(
        filePath,
        `Invalid row ${i + 1} in ${filePath}:\n${formatZodErrors(result.error.issues)}`,
        { row: i + 1, cause: result.error }
      )
    }
    return result.data
  })
}
