export type TranscriptSegment = {
  start: number
  end: number
  text: string
}

export type TranscriptBatch = {
  segments: TranscriptSegment[]
  text: string
  estimatedTokens: number
}

export type SubtitleFormat = 'srt' | 'vtt' | 'json'

export type TranscriptStatistics = {
  totalSegments: number
  totalDurationSeconds: number
  totalWords: number
  wordsPerMinute: number
}
