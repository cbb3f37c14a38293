import type { TranscriptSegment } from '../transcript/types.js'

export type EnhancementLevel = 'basic' | 'detailed' | 'academic'
export type PromptStyle = 'clear' | 'academic' | 'conversational' | 'technical'

export const ENHANCEMENT_LEVELS: readonly EnhancementLevel[] = ['basic', 'detailed', 'academic']
export const PROMPT_STYLES: readonly PromptStyle[] = [
  'clear',
  'academic',
  'conversational',
  'technical',
]

export type EnhancementSettings = {
  enabled: boolean
  level: EnhancementLevel
  style: PromptStyle
  /** `{text}`, `{level}` and `{style}` are substituted. */
  promptTemplate: string | null
  model: string
  batchTargetTokens: number
  batching: boolean
  /** USD; 0 disables the cap. */
  maxCost: number
  costPer1kTokens: number
  cache: boolean
  /** Extra attempts after the first failed call. */
  retries: number
  retryDelayMs: number
  timeoutMs: number
  maxOutputTokens: number
}

export type EnhancedSegment = {
  segment: TranscriptSegment
  enhancedText: string
  keyPoints: string[]
}

export type EnhancementStats = {
  totalSegments: number
  enhancedSegments: number
  batches: number
  cachedBatches: number
  totalTokens: number
  totalCost: number
  errors: string[]
  elapsedMs: number
  costLimitReached: boolean
}

export type ParsedEnhancement = {
  text: string
  keyPoints: string[]
}
