import type { TranscriptSegment } from './types.js'

/**
 * Maps the rewritten text of one batch back onto that batch's segments.
 * Returns one text per input segment.
 */
export type TextRedistributor = {
  redistribute: (enhancedText: string, segments: readonly TranscriptSegment[]) => string[]
}

export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0)
}

export const sentenceRedistributor: TextRedistributor = {
  redistribute(enhancedText, segments) {
    const count = segments.length
    if (count === 0) return []
    const sentences = splitSentences(enhancedText)
    const base = Math.floor(sentences.length / count)
    const extra = sentences.length % count

    const result: string[] = []
    let cursor = 0
    segments.forEach((segment, index) => {
      const take = base + (index < extra ? 1 : 0)
      const assigned = sentences.slice(cursor, cursor + take)
      cursor += take
      result.push(assigned.length > 0 ? `${assigned.join('. ')}.` : segment.text)
    })
    return result
  },
}
