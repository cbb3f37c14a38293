import type { TranscriptBatch, TranscriptSegment } from './types.js'

export const DEFAULT_BATCH_TARGET_TOKENS = 1500

const CHARS_PER_TOKEN = 3.5
const MAX_FACTOR = 1.5
const MIN_FACTOR = 0.7

export type BatchOptions = {
  targetTokens?: number
  enabled?: boolean
}

export function estimateTokens(text: string): number {
  return Math.max(1, Math.ceil(text.length / CHARS_PER_TOKEN))
}

function toBatch(segments: TranscriptSegment[], estimatedTokens: number): TranscriptBatch {
  return {
    segments,
    text: segments.map((segment) => segment.text).join(' '),
    estimatedTokens,
  }
}

/**
 * Greedy single pass. A batch is closed before a segment only when adding it would
 * pass 1.5x the target and the batch already holds at least 0.7x the target, so a
 * single oversized segment still lands in a batch of its own.
 */
export function packTranscriptBatches(
  segments: readonly TranscriptSegment[],
  { targetTokens = DEFAULT_BATCH_TARGET_TOKENS, enabled = true }: BatchOptions = {}
): TranscriptBatch[] {
  if (!enabled) {
    return segments.map((segment) => toBatch([segment], estimateTokens(segment.text)))
  }

  const maxTokens = targetTokens * MAX_FACTOR
  const minTokens = targetTokens * MIN_FACTOR
  const batches: TranscriptBatch[] = []
  let current: TranscriptSegment[] = []
  let running = 0

  for (const segment of segments) {
    const tokens = estimateTokens(segment.text)
    if (running + tokens > maxTokens && running >= minTokens) {
      batches.push(toBatch(current, running))
      current = []
      running = 0
    }
    current.push(segment)
    running += tokens
  }
  if (current.length > 0) batches.push(toBatch(current, running))
  return batches
}
