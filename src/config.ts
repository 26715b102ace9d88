import { z } from 'zod'
import { parse as yamlParse } from 'yaml'
import { invalidMessage } from './error-utils.js'
import { readFileOrNull } from './utils/fs.js'

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

/**
 * Where the CSV graph source reads from. Relative paths are resolved against
 * the base directory passed to `createGlossary` (the config file's directory
 * when loaded through `loadConfigFile`).
 */
const dataSchema = z
  .object({
    /** CSV with a `term,definition` header row. */
    termsFile: z.string().min(1, 'data.termsFile must not be empty').default('terms.csv'),
    /** CSV with a `source,target,relation` header row. */
    linksFile: z.string().min(1, 'data.linksFile must not be empty').default('links.csv'),
  })
  .strip()

/**
 * Bounds and defaults for the two traversals. A request depth of 0 (or an
 * absent depth) resolves to the matching default below, never to "unbounded".
 */
export const traversalSchema = z
  .object({
    /**
     * Depth used by relation listing when the request leaves `maxDepth` unset
     * or sets it to 0. 1 = direct relations only.
     * @default 1
     */
    defaultRelationDepth: z
      .number()
      .int()
      .min(1, 'traversal.defaultRelationDepth must be at least 1')
      .max(10, 'traversal.defaultRelationDepth must be at most 10')
      .default(1),
    /**
     * Depth used by path search when the request leaves `maxDepth` unset or
     * sets it to 0.
     * @default 10
     */
    defaultPathDepth: z
      .number()
      .int()
      .min(1, 'traversal.defaultPathDepth must be at least 1')
      .max(50, 'traversal.defaultPathDepth must be at most 50')
      .default(10),
    /**
     * Which edges path search may cross:
     * - "both": a relation links its endpoints in either direction (default)
     * - "forward": only from source to target
     */
    pathDirection: z.enum(['both', 'forward']).default('both'),
    /**
     * Distinct terms a single traversal may visit before it stops and reports
     * a truncated result.
     * @default 10000
     */
    maxVisitedTerms: z
      .number()
      .int()
      .min(10, 'traversal.maxVisitedTerms must be at least 10')
      .max(1_000_000, 'traversal.maxVisitedTerms must be at most 1000000')
      .default(10_000),
  })
  .strip()

/**
 * Structured metric output. When enabled, events go to stderr via
 * console.warn with a `[glossary:metrics]` prefix; `filePath` additionally
 * appends them as JSONL.
 */
const metricsSchema = z
  .object({
    enabled: z.boolean().default(false),
    filePath: z.string().min(1, 'metrics.filePath must not be empty').optional(),
  })
  .strip()

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

/**
 * Zod schema for the glossary configuration.
 *
 * - Unknown keys are stripped, not rejected.
 * - All fields have defaults; an empty object `{}` produces a fully-valid config.
 */
export const glossaryConfigSchema = z
  .object({
    data: dataSchema.default({}),
    traversal: traversalSchema.default({}),
    metrics: metricsSchema.default({}),
  })
  .strip()

// ---------------------------------------------------------------------------
// Unknown-key helpers for parseConfig
// ---------------------------------------------------------------------------

const SUB_SCHEMA_SHAPES: Record<string, ReadonlySet<string>> = {
  data: new Set(Object.keys(dataSchema.shape)),
  traversal: new Set(Object.keys(traversalSchema.shape)),
  metrics: new Set(Object.keys(metricsSchema.shape)),
}

/**
 * Returns unknown key paths in `raw` at the top level and one level deep
 * inside recognised sub-objects (e.g. `"traversal.typo"`).
 */
function collectUnknownConfigKeys(raw: Record<string, unknown>): readonly string[] {
  const topLevelKnown = new Set(Object.keys(glossaryConfigSchema.shape))
  const result: string[] = []
  for (const [key, nested] of Object.entries(raw)) {
    if (!topLevelKnown.has(key)) {
      result.push(key)
      continue
    }
    const subShape = SUB_SCHEMA_SHAPES[key]
    if (subShape === undefined || !isPlainObject(nested)) continue
    for (const subKey of Object.keys(nested)) {
      if (!subShape.has(subKey)) result.push(`${key}.${subKey}`)
    }
  }
  return result
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/** Options accepted by {@link parseConfig}. */
export interface ParseConfigOptions {
  /**
   * Called with all unknown key paths (e.g. `["unknownTop", "traversal.typo"]`)
   * when the raw input contains keys not recognised by the schema.
   * @example
   *   parseConfig(raw, {
   *     onUnknownKeys: (keys) => console.warn(`Unknown keys: ${keys.join(', ')}`)
   *   })
   */
  onUnknownKeys?: (keys: readonly string[]) => void
}

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

/** Utility: recursively marks all fields and nested arrays readonly. */
type DeepReadonly<T> =
  T extends (infer U)[]
    ? ReadonlyArray<DeepReadonly<U>>
    : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

/** Fully-resolved glossary configuration with all defaults applied. Immutable. */
export type GlossaryConfig = DeepReadonly<z.infer<typeof glossaryConfigSchema>>

// ---------------------------------------------------------------------------
// ConfigValidationError
// ---------------------------------------------------------------------------

/**
 * Thrown by `parseConfig` when the input contains invalid values.
 *
 * The message lists every failing field path; the original `ZodError` is
 * preserved as `Error.cause`.
 */
export class ConfigValidationError extends Error {
  /** Structured list of validation failures, one per invalid field. */
  readonly issues: readonly z.ZodIssue[]

  constructor(zodError: z.ZodError) {
    super(invalidMessage('Glossary configuration', zodError.issues), { cause: zodError })
    this.name = 'ConfigValidationError'
    this.issues = zodError.issues
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// ---------------------------------------------------------------------------
// Parse / load
// ---------------------------------------------------------------------------

/**
 * Parses and validates raw (unknown) config input, applying all defaults.
 *
 * Unknown keys are stripped; `options.onUnknownKeys` receives their paths.
 *
 * @throws {ConfigValidationError} if the input contains invalid values.
 */
export function parseConfig(raw: unknown, options: ParseConfigOptions = {}): GlossaryConfig {
  const result = glossaryConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigValidationError(result.error)
  }

  if (isPlainObject(raw) && options.onUnknownKeys !== undefined) {
    const unknownKeys = collectUnknownConfigKeys(raw)
    if (unknownKeys.length > 0) {
      try {
        options.onUnknownKeys(unknownKeys)
      } catch (err) {
        console.error('[glossary] parseConfig: onUnknownKeys callback threw, notification skipped:', err)
      }
    }
  }

  return result.data
}

/**
 * Reads a YAML config file and parses it with {@link parseConfig}.
 * A missing file yields the defaults; unknown keys are logged.
 *
 * @throws {ConfigValidationError} if the file's values are invalid.
 * @throws If the file is not valid YAML or its root is not a mapping.
 */
export async function loadConfigFile(filePath: string): Promise<GlossaryConfig> {
  const raw = await readFileOrNull(filePath)
  if (raw === null) {
    console.warn(`[glossary] config: ${filePath} not found, using defaults`)
    return parseConfig({})
  }

  const parsed = yamlParse(raw) as unknown
  if (parsed !== null && !isPlainObject(parsed)) {
    throw new Error(
      `Config file ${filePath} parsed to ${Array.isArray(parsed) ? 'array' : typeof parsed} instead of a mapping`
    )
  }

  return parseConfig(parsed, {
    onUnknownKeys: (keys) =>
      console.warn(`[glossary] config: ignoring unknown keys in ${filePath}: ${keys.join(', ')}`),
  })
}
