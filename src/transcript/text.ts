import type { TranscriptSegment, TranscriptStatistics } from './types.js'

/**
 * Collapses whitespace and drops bracketed annotations such as `[Music]` or `(laughs)`.
 */
export function cleanTranscriptText(text: string): string {
  return text
    .replace(/\[[^\]]*\]/g, ' ')
    .replace(/\([^)]*\)/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

export function stripMarkdownFormatting(text: string): string {
  return text
    .replace(/```[\s\S]*?```/g, ' ')
    .replace(/`([^`]*)`/g, '$1')
    .replace(/!\[[^\]]*\]\([^)]*\)/g, ' ')
    .replace(/\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/^\s{0,3}#{1,6}\s+/gm, '')
    .replace(/^\s{0,3}>\s?/gm, '')
    .replace(/^\s*[-*+]\s+/gm, '')
    .replace(/(\*\*|__)(.*?)\1/g, '$2')
    .replace(/(\*|_)(.*?)\1/g, '$2')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim()
}

export function countWords(text: string): number {
  const trimmed = text.trim()
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length
}

export function transcriptStatistics(segments: readonly TranscriptSegment[]): TranscriptStatistics {
  if (segments.length === 0) {
    return { totalSegments: 0, totalDurationSeconds: 0, totalWords: 0, wordsPerMinute: 0 }
  }
  let firstStart = Number.POSITIVE_INFINITY
  let lastEnd = Number.NEGATIVE_INFINITY
  let totalWords = 0
  for (const segment of segments) {
    if (segment.start < firstStart) firstStart = segment.start
    if (segment.end > lastEnd) lastEnd = segment.end
    totalWords += countWords(segment.text)
  }
  const totalDurationSeconds = Math.max(0, lastEnd - firstStart)
  const wordsPerMinute =
    totalDurationSeconds > 0 ? Math.round((totalWords / totalDurationSeconds) * 60) : 0
  return { totalSegments: segments.length, totalDurationSeconds, totalWords, wordsPerMinute }
}
