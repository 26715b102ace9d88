/**
 * error-utils.ts — Message helpers shared by config, batch, CSV row and
 * request validation.
 */

import type { z } from 'zod'

/**
 * Renders a zod issue path the way glossary messages quote fields:
 *   []                          → "(root)"
 *   ["traversal", "pathDirection"] → "traversal.pathDirection"
 *   ["relations", 2, "type"]    → "relations[2].type"
 */
export function formatZodPath(path: readonly (string | number)[]): string {
  if (path.length === 0) return '(root)'
  return path
    .map((seg, i) => (typeof seg === 'number' ? `[${seg}]` : i === 0 ? seg : `.${seg}`))
    .join('')
}

/** One `  path: message` line per issue. */
export function formatZodErrors(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => `  ${formatZodPath(issue.path)}: ${issue.message}`)
    .join('\n')
}

/** `"<subject> is invalid:"` followed by the issue lines. */
export function invalidMessage(subject: string, issues: readonly z.ZodIssue[]): string {
  return `${subject} is invalid:\n${formatZodErrors(issues)}`
}

/** The message of a thrown value, whether or not it is an `Error`. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
