import type { LanguageModel } from 'ai'

import { createExternalCallError } from '../errors.js'
import { type LlmProvider, parseGatewayStyleModelId } from './model-id.js'

export type LlmApiKeys = {
  xaiApiKey: string | null
  openaiApiKey: string | null
  googleApiKey: string | null
  anthropicApiKey: string | null
}

export type LlmBaseUrls = Partial<Record<LlmProvider, string | null>>

export type LlmTokenUsage = {
  promptTokens: number | null
  completionTokens: number | null
  totalTokens: number | null
}

export type GenerateTextResult = {
  text: string
  canonicalModelId: string
  provider: LlmProvider
  usage: LlmTokenUsage | null
}

export type GenerateTextArgs = {
  modelId: string
  system?: string
  prompt: string
  maxOutputTokens?: number
  temperature?: number
  timeoutMs: number
  signal?: AbortSignal
}

/**
 * The seam the enhancer calls through; tests substitute a scripted function.
 */
export type GenerateTextFn = (args: GenerateTextArgs) => Promise<GenerateTextResult>

const finiteOrNull = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null

export function normalizeTokenUsage(raw: unknown): LlmTokenUsage | null {
  if (!raw || typeof raw !== 'object') return null
  const read = (key: string): number | null =>
    key in raw ? finiteOrNull(Reflect.get(raw, key)) : null

  const promptTokens = read('promptTokens') ?? read('inputTokens')
  const completionTokens = read('completionTokens') ?? read('outputTokens')
  const totalTokens = read('totalTokens')
  if (promptTokens === null && completionTokens === null && totalTokens === null) {
    return null
  }
  return { promptTokens, completionTokens, totalTokens }
}

const MISSING_KEY_MESSAGES: Record<LlmProvider, string> = {
  xai: 'Missing XAI_API_KEY for xai/... model',
  openai: 'Missing OPENAI_API_KEY for openai/... model',
  google:
    'Missing GOOGLE_GENERATIVE_AI_API_KEY (or GEMINI_API_KEY / GOOGLE_API_KEY) for google/... model',
  anthropic: 'Missing ANTHROPIC_API_KEY for anthropic/... model',
}

function lookupApiKey(provider: LlmProvider, apiKeys: LlmApiKeys): string | null {
  return provider === 'xai'
    ? apiKeys.xaiApiKey
    : provider === 'google'
      ? apiKeys.googleApiKey
      : provider === 'anthropic'
        ? apiKeys.anthropicApiKey
        : apiKeys.openaiApiKey
}

/** Null when a key for the model's provider is configured. */
export function missingApiKeyMessage(modelId: string, apiKeys: LlmApiKeys): string | null {
  const { provider } = parseGatewayStyleModelId(modelId)
  return lookupApiKey(provider, apiKeys) ? null : MISSING_KEY_MESSAGES[provider]
}

function resolveApiKey(provider: LlmProvider, apiKeys: LlmApiKeys): string {
  const key = lookupApiKey(provider, apiKeys)
  if (!key) throw new Error(MISSING_KEY_MESSAGES[provider])
  return key
}

async function resolveLanguageModel({
  provider,
  model,
  apiKey,
  baseURL,
  fetchImpl,
}: {
  provider: LlmProvider
  model: string
  apiKey: string
  baseURL: string | undefined
  fetchImpl: typeof fetch
}): Promise<LanguageModel> {
  if (provider === 'xai') {
    const { createXai } = await import('@ai-sdk/xai')
    return createXai({ apiKey, baseURL, fetch: fetchImpl })(model)
  }
  if (provider === 'google') {
    const { createGoogleGenerativeAI } = await import('@ai-sdk/google')
    return createGoogleGenerativeAI({ apiKey, baseURL, fetch: fetchImpl })(model)
  }
  if (provider === 'anthropic') {
    const { createAnthropic } = await import('@ai-sdk/anthropic')
    return createAnthropic({ apiKey, baseURL, fetch: fetchImpl })(model)
  }
  const { createOpenAI } = await import('@ai-sdk/openai')
  return createOpenAI({ apiKey, baseURL, fetch: fetchImpl })(model)
}

export async function generateTextWithModelId({
  modelId,
  apiKeys,
  baseUrls = {},
  system,
  prompt,
  maxOutputTokens,
  timeoutMs,
  temperature,
  signal,
  fetchImpl,
}: GenerateTextArgs & {
  apiKeys: LlmApiKeys
  baseUrls?: LlmBaseUrls
  fetchImpl: typeof fetch
}): Promise<GenerateTextResult> {
  const parsed = parseGatewayStyleModelId(modelId)
  const apiKey = resolveApiKey(parsed.provider, apiKeys)

  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  const forwardAbort = () => controller.abort(signal?.reason)
  signal?.addEventListener('abort', forwardAbort, { once: true })

  try {
    const { generateText } = await import('ai')
    const model = await resolveLanguageModel({
      provider: parsed.provider,
      model: parsed.model,
      apiKey,
      baseURL: baseUrls[parsed.provider] ?? undefined,
      fetchImpl,
    })
    const result = await generateText({
      model,
      system,
      prompt,
      ...(typeof temperature === 'number' ? { temperature } : {}),
      ...(typeof maxOutputTokens === 'number' ? { maxOutputTokens } : {}),
      abortSignal: controller.signal,
    })
    return {
      text: result.text,
      canonicalModelId: parsed.canonical,
      provider: parsed.provider,
      usage: normalizeTokenUsage(result.usage),
    }
  } catch (error) {
    if (signal?.aborted) throw error
    if (controller.signal.aborted) {
      throw createExternalCallError('LLM request timed out', error)
    }
    throw createExternalCallError(
      `LLM request failed: ${error instanceof Error ? error.message : String(error)}`,
      error
    )
  } finally {
    clearTimeout(timeout)
    signal?.removeEventListener('abort', forwardAbort)
  }
}

/**
 * Binds keys, base URLs and fetch so callers only pass per-request arguments.
 */
export function createModelClient({
  apiKeys,
  baseUrls,
  fetchImpl,
}: {
  apiKeys: LlmApiKeys
  baseUrls?: LlmBaseUrls
  fetchImpl: typeof fetch
}): GenerateTextFn {
  return (args) => generateTextWithModelId({ ...args, apiKeys, baseUrls, fetchImpl })
}

export function resolveApiKeysFromEnv(env: Record<string, string | undefined>): LlmApiKeys {
  const pick = (...keys: string[]) => {
    for (const key of keys) {
      const value = env[key]?.trim()
      if (value) return value
    }
    return null
  }
  return {
    xaiApiKey: pick('XAI_API_KEY'),
    openaiApiKey: pick('OPENAI_API_KEY'),
    googleApiKey: pick('GOOGLE_GENERATIVE_AI_API_KEY', 'GEMINI_API_KEY', 'GOOGLE_API_KEY'),
    anthropicApiKey: pick('ANTHROPIC_API_KEY'),
  }
}
