/**
 * Metric sinks: a structured console line and an optional JSONL file.
 */

import { promises as fs } from 'node:fs'
import { dirname } from 'node:path'
import { errorMessage } from '../error-utils.js'
import type { MetricEvent, MetricListener } from './types.js'

/** Writes `[glossary:metrics] {json}` to stderr via console.warn. */
export function emitMetric(event: MetricEvent): void {
  console.warn(`[glossary:metrics] ${JSON.stringify(event)}`)
}

/**
 * Appends `event` as one JSON line to `filePath`, creating parent
 * directories as needed.
 *
 * Never throws; errors are logged.
 */
export async function appendMetricsFile(filePath: string, event: MetricEvent): Promise<void> {
  try {
    await fs.mkdir(dirname(filePath), { recursive: true })
    await fs.appendFile(filePath, JSON.stringify(event) + '\n', 'utf-8')
  } catch (err) {
    console.error(
      `[glossary] metrics: failed to append to ${filePath}:`,
      errorMessage(err),
    )
  }
}

/**
 * Builds a listener that emits every event to the console and, when
 * `filePath` is set, also appends it to that JSONL file.
 */
export function createMetricSink(options: { readonly filePath?: string }): MetricListener {
  const { filePath } = options
  return (event) => {
    emitMetric(event)
    if (filePath !== undefined) {
      appendMetricsFile(filePath, event).catch((err: unknown) => {
        console.error('[glossary] metrics: unexpected append failure:', err)
      })
    }
  }
}
