import { promises as fs } from 'node:fs'
import path from 'node:path'

import type { SleepFn } from '../enhance/enhancer.js'
import { formatErrorMessage, isNamedError, throwIfAborted } from '../errors.js'
import type { AppLogger } from '../logging/logger.js'
import { isRemoteInput } from '../media/yt-dlp.js'
import type { DeckResult } from './types.js'

export const BATCH_RESULTS_FILE = 'batch-results.json'

export type BatchItemResult = {
  index: number
  input: string
  outputDir: string
  status: 'ok' | 'failed' | 'skipped'
  documentPath?: string
  slides?: number
  error?: string
}

export type BatchResults = {
  total: number
  successful: number
  failed: number
  items: BatchItemResult[]
}

/** One input per line; blank lines and `#` comments are ignored. */
export function parseBatchList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
}

function inputSlug(input: string): string {
  let name = input
  if (isRemoteInput(input)) {
    try {
      const url = new URL(input)
      name = url.searchParams.get('v') ?? url.pathname.split('/').filter(Boolean).pop() ?? url.hostname
    } catch {
      name = input
    }
  } else {
    name = path.basename(input, path.extname(input))
  }
  const slug = name
    .replace(/[^A-Za-z0-9_-]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 50)
  return slug || 'video'
}

/** `003-intro-talk` under the batch output directory. */
export function resolveBatchOutputDir(baseDir: string, index: number, input: string): string {
  return path.join(baseDir, `${String(index).padStart(3, '0')}-${inputSlug(input)}`)
}

/**
 * Processes inputs one after another. Without `continueOnError` the first failure
 * stops the run and later inputs are reported as skipped.
 */
export async function runBatch({
  inputs,
  baseDir,
  processOne,
  continueOnError,
  delayMs,
  logger = null,
  sleep,
  signal,
}: {
  inputs: readonly string[]
  baseDir: string
  processOne: (input: string, outputDir: string) => Promise<DeckResult>
  continueOnError: boolean
  delayMs: number
  logger?: AppLogger | null
  sleep: SleepFn
  signal?: AbortSignal
}): Promise<BatchResults> {
  const results: BatchResults = { total: inputs.length, successful: 0, failed: 0, items: [] }
  let stopped = false

  for (const [offset, input] of inputs.entries()) {
    const index = offset + 1
    const outputDir = resolveBatchOutputDir(baseDir, index, input)
    if (stopped) {
      results.items.push({ index, input, outputDir, status: 'skipped' })
      continue
    }
    throwIfAborted(signal)
    logger?.info(`[${index}/${inputs.length}] ${input}`)
    try {
      const deck = await processOne(input, outputDir)
      results.successful += 1
      results.items.push({
        index,
        input,
        outputDir,
        status: 'ok',
        documentPath: deck.documentPath,
        slides: deck.slides.length,
      })
    } catch (error) {
      if (isNamedError(error, 'AbortError') || signal?.aborted) throw error
      const message = formatErrorMessage(error)
      results.failed += 1
      results.items.push({ index, input, outputDir, status: 'failed', error: message })
      logger?.error(`[${index}/${inputs.length}] failed: ${message}`)
      if (!continueOnError) {
        logger?.warn('stopping batch after failure (use --continue-on-error to keep going)')
        stopped = true
        continue
      }
    }
    if (index < inputs.length && delayMs > 0) await sleep(delayMs, signal)
  }
  return results
}

export async function writeBatchResults(baseDir: string, results: BatchResults): Promise<string> {
  await fs.mkdir(baseDir, { recursive: true })
  const target = path.join(baseDir, BATCH_RESULTS_FILE)
  await fs.writeFile(target, `${JSON.stringify(results, null, 2)}\n`, 'utf8')
  return target
}
