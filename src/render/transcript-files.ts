import type { EnhancedSegment } from '../enhance/types.js'
import { transcriptStatistics } from '../transcript/text.js'
import type { TranscriptSegment } from '../transcript/types.js'
import { formatClock } from './format.js'

export const ORIGINAL_TRANSCRIPT_FILE = 'original_transcript.txt'
export const ENHANCED_TRANSCRIPT_FILE = 'enhanced_transcript.txt'

const RULE = '='.repeat(50)

const segmentHeading = (index: number, segment: TranscriptSegment) =>
  `Segment ${index + 1} [${formatClock(segment.start)} - ${formatClock(segment.end)}]`

export function renderOriginalTranscript(segments: readonly TranscriptSegment[]): string {
  const lines = ['Original Transcript with Timestamps', RULE, '']
  segments.forEach((segment, index) => {
    lines.push(segmentHeading(index, segment), segment.text, '')
  })
  const stats = transcriptStatistics(segments)
  lines.push(
    RULE,
    `Total segments: ${stats.totalSegments}`,
    `Total words: ${stats.totalWords}`,
    `Duration: ${stats.totalDurationSeconds.toFixed(2)} seconds`
  )
  return `${lines.join('\n')}\n`
}

export function renderEnhancedTranscript(enhanced: readonly EnhancedSegment[]): string {
  const lines = ['Enhanced Transcript with Timestamps', RULE, '']
  let enhancedCount = 0
  enhanced.forEach((entry, index) => {
    lines.push(segmentHeading(index, entry.segment))
    if (entry.enhancedText && entry.enhancedText !== entry.segment.text) {
      enhancedCount += 1
      lines.push(`Enhanced: ${entry.enhancedText}`, `Original: ${entry.segment.text}`)
      if (entry.keyPoints.length > 0) {
        lines.push('Key Points:', ...entry.keyPoints.map((point) => `  - ${point}`))
      }
    } else {
      lines.push(entry.segment.text)
    }
    lines.push('')
  })
  const coverage = enhanced.length > 0 ? (enhancedCount / enhanced.length) * 100 : 0
  lines.push(
    RULE,
    `Total segments: ${enhanced.length}`,
    `Enhanced segments: ${enhancedCount}`,
    `Enhancement coverage: ${coverage.toFixed(1)}%`
  )
  return `${lines.join('\n')}\n`
}
