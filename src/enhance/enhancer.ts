import { setTimeout as delay } from 'node:timers/promises'

import {
  createExternalCallError,
  formatErrorMessage,
  isNamedError,
  throwIfAborted,
} from '../errors.js'
import type { GenerateTextFn, GenerateTextResult, LlmTokenUsage } from '../llm/generate-text.js'
import type { AppLogger } from '../logging/logger.js'
import { estimateTokens, packTranscriptBatches } from '../transcript/batching.js'
import { sentenceRedistributor, type TextRedistributor } from '../transcript/redistribute.js'
import type { TranscriptBatch, TranscriptSegment } from '../transcript/types.js'
import { buildEnhancementCacheKey, EnhancementCache } from './cache.js'
import { buildEnhancementPrompt, parseEnhancementResponse } from './prompts.js'
import type {
  EnhancedSegment,
  EnhancementSettings,
  EnhancementStats,
  ParsedEnhancement,
} from './types.js'

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>

export type TranscriptEnhancerOptions = {
  settings: EnhancementSettings
  generate: GenerateTextFn
  redistributor?: TextRedistributor
  cache?: EnhancementCache | null
  logger?: AppLogger | null
  sleep?: SleepFn
  now?: () => number
}

export type EnhancementOutcome = {
  segments: EnhancedSegment[]
  stats: EnhancementStats
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal })
}

export function createEmptyStats(totalSegments = 0): EnhancementStats {
  return {
    totalSegments,
    enhancedSegments: 0,
    batches: 0,
    cachedBatches: 0,
    totalTokens: 0,
    totalCost: 0,
    errors: [],
    elapsedMs: 0,
    costLimitReached: false,
  }
}

/**
 * Reported usage when the provider gives it, otherwise a character-based estimate
 * of prompt plus reply.
 */
export function resolveTokensUsed(
  usage: LlmTokenUsage | null,
  prompt: string,
  reply: string
): number {
  if (usage?.totalTokens != null) return usage.totalTokens
  if (usage?.promptTokens != null && usage.completionTokens != null) {
    return usage.promptTokens + usage.completionTokens
  }
  return estimateTokens(prompt) + estimateTokens(reply)
}

const keepOriginal = (segment: TranscriptSegment): EnhancedSegment => ({
  segment,
  enhancedText: segment.text,
  keyPoints: [],
})

export class TranscriptEnhancer {
  private readonly settings: EnhancementSettings
  private readonly generate: GenerateTextFn
  private readonly redistributor: TextRedistributor
  private readonly cache: EnhancementCache
  private readonly logger: AppLogger | null
  private readonly sleep: SleepFn
  private readonly now: () => number

  constructor(options: TranscriptEnhancerOptions) {
    this.settings = options.settings
    this.generate = options.generate
    this.redistributor = options.redistributor ?? sentenceRedistributor
    this.cache = options.cache ?? new EnhancementCache()
    this.logger = options.logger ?? null
    this.sleep = options.sleep ?? defaultSleep
    this.now = options.now ?? Date.now
  }

  /**
   * Rewrites segments batch by batch. Failed batches and every batch after the cost
   * cap keep their original text; only cancellation aborts the run.
   */
  async enhanceSegments(
    segments: readonly TranscriptSegment[],
    { signal }: { signal?: AbortSignal } = {}
  ): Promise<EnhancementOutcome> {
    const startedAt = this.now()
    const stats = createEmptyStats(segments.length)
    const batches = packTranscriptBatches(segments, {
      targetTokens: this.settings.batchTargetTokens,
      enabled: this.settings.batching,
    })
    stats.batches = batches.length
    if (this.settings.cache && this.cache.loadError) {
      stats.errors.push(this.cache.loadError)
      this.logger?.warn(`${this.cache.loadError}; starting with an empty cache`)
    }
    this.logger?.info(`enhancing ${segments.length} segments in ${batches.length} batches`)

    const results: EnhancedSegment[] = []
    for (const [index, batch] of batches.entries()) {
      throwIfAborted(signal)
      if (stats.costLimitReached) {
        results.push(...batch.segments.map(keepOriginal))
        continue
      }

      const parsed = await this.enhanceBatch(batch, index, batches.length, stats, signal)
      if (!parsed) {
        results.push(...batch.segments.map(keepOriginal))
      } else {
        const texts = this.redistributor.redistribute(parsed.text, batch.segments)
        batch.segments.forEach((segment, position) => {
          results.push({
            segment,
            enhancedText: texts[position] ?? segment.text,
            keyPoints: position === 0 ? parsed.keyPoints : [],
          })
        })
        stats.enhancedSegments += batch.segments.length
      }

      if (this.settings.maxCost > 0 && stats.totalCost > this.settings.maxCost) {
        stats.costLimitReached = true
        this.logger?.warn(
          `cost limit reached ($${stats.totalCost.toFixed(4)} > $${this.settings.maxCost}); remaining batches keep original text`
        )
      }
    }

    if (this.settings.cache) {
      try {
        await this.cache.save()
      } catch (error) {
        const message = `Could not save enhancement cache: ${formatErrorMessage(error)}`
        stats.errors.push(message)
        this.logger?.warn(message)
      }
    }
    stats.elapsedMs = this.now() - startedAt
    this.logger?.info(
      `enhanced ${stats.enhancedSegments}/${stats.totalSegments} segments, tokens=${stats.totalTokens} cost=$${stats.totalCost.toFixed(4)}`
    )
    return { segments: results, stats }
  }

  private async enhanceBatch(
    batch: TranscriptBatch,
    index: number,
    total: number,
    stats: EnhancementStats,
    signal: AbortSignal | undefined
  ): Promise<ParsedEnhancement | null> {
    const cacheKey = buildEnhancementCacheKey(this.settings.level, batch.text)
    if (this.settings.cache) {
      const cached = this.cache.get(cacheKey)
      if (cached) {
        stats.cachedBatches += 1
        this.logger?.debug(`batch ${index + 1}/${total} served from cache`)
        return cached
      }
    }

    const prompt = buildEnhancementPrompt({
      text: batch.text,
      level: this.settings.level,
      style: this.settings.style,
      template: this.settings.promptTemplate,
    })
    this.logger?.debug(
      `batch ${index + 1}/${total}: ${batch.segments.length} segments, ~${batch.estimatedTokens} tokens`
    )

    try {
      const result = await this.callWithRetries(prompt, signal)
      const tokens = resolveTokensUsed(result.usage, prompt, result.text)
      stats.totalTokens += tokens
      stats.totalCost += (tokens / 1000) * this.settings.costPer1kTokens
      const parsed = parseEnhancementResponse(result.text)
      if (!parsed.text) return null
      if (this.settings.cache) this.cache.set(cacheKey, parsed)
      return parsed
    } catch (error) {
      if (isNamedError(error, 'AbortError') || signal?.aborted) throw error
      const message = formatErrorMessage(error)
      stats.errors.push(message)
      this.logger?.error(`batch ${index + 1}/${total} failed, keeping original text: ${message}`)
      return null
    }
  }

  private async callWithRetries(
    prompt: string,
    signal: AbortSignal | undefined
  ): Promise<GenerateTextResult> {
    const attempts = this.settings.retries + 1
    for (let attempt = 0; ; attempt += 1) {
      throwIfAborted(signal)
      try {
        return await this.generate({
          modelId: this.settings.model,
          prompt,
          maxOutputTokens: this.settings.maxOutputTokens,
          timeoutMs: this.settings.timeoutMs,
          signal,
        })
      } catch (error) {
        if (isNamedError(error, 'AbortError') || signal?.aborted) throw error
        if (attempt + 1 >= attempts) {
          throw createExternalCallError(
            `Enhancement call failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${formatErrorMessage(error)}`,
            error
          )
        }
        const waitMs = this.settings.retryDelayMs * 2 ** attempt
        this.logger?.warn(
          `enhancement call failed, retrying in ${waitMs}ms: ${formatErrorMessage(error)}`
        )
        await this.sleep(waitMs, signal)
      }
    }
  }
}
