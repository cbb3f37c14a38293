export type LlmProvider = 'xai' | 'openai' | 'google' | 'anthropic'

export const LLM_PROVIDERS: readonly LlmProvider[] = ['xai', 'openai', 'google', 'anthropic']

export type ParsedModelId = {
  provider: LlmProvider
  model: string
  canonical: string
}

function isLlmProvider(value: string): value is LlmProvider {
  return LLM_PROVIDERS.some((provider) => provider === value)
}

/**
 * Accepts `provider/model`. A bare model name is treated as an OpenAI model.
 */
export function parseGatewayStyleModelId(raw: string): ParsedModelId {
  const trimmed = raw.trim()
  if (!trimmed) throw new Error('Missing model id')
  const slash = trimmed.indexOf('/')
  if (slash === -1) {
    return { provider: 'openai', model: trimmed, canonical: `openai/${trimmed}` }
  }
  const provider = trimmed.slice(0, slash).toLowerCase()
  const model = trimmed.slice(slash + 1).trim()
  if (!isLlmProvider(provider)) {
    throw new Error(`Unsupported model provider "${provider}" (expected ${LLM_PROVIDERS.join(', ')})`)
  }
  if (!model) throw new Error(`Missing model name in "${raw}"`)
  return { provider, model, canonical: `${provider}/${model}` }
}
