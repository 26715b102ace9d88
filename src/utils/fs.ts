import { promises as fs } from 'node:fs'

/** True for a filesystem error whose code is ENOENT (missing CSV or config file). */
export function isEnoent(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT'
}

/**
 * UTF-8 contents of `filePath`, or null when it does not exist. Used for the
 * optional config file and the graph's CSV sources; any other read failure
 * is rethrown.
 */
export async function readFileOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8')
  } catch (err) {
    if (!isEnoent(err)) throw err
    return null
  }
}
