import { describe, expect, it } from 'vitest'

import { parseGatewayStyleModelId } from '../src/llm/model-id.js'

describe('parseGatewayStyleModelId', () => {
  it('splits provider and model', () => {
    expect(parseGatewayStyleModelId(' Anthropic/claude-sonnet-4-5 ')).toEqual({
      provider: 'anthropic',
      model: 'claude-sonnet-4-5',
      canonical: 'anthropic/claude-sonnet-4-5',
    })
  })

  it('keeps slashes after the provider in the model name', () => {
    expect(parseGatewayStyleModelId('openai/ft:gpt-4o/custom').model).toBe('ft:gpt-4o/custom')
  })

  it('defaults bare names to openai', () => {
    expect(parseGatewayStyleModelId('gpt-4o-mini').canonical).toBe('openai/gpt-4o-mini')
  })

  it('rejects unknown providers and empty ids', () => {
    expect(() => parseGatewayStyleModelId('mistral/large')).toThrow(
      'Unsupported model provider "mistral" (expected xai, openai, google, anthropic)'
    )
    expect(() => parseGatewayStyleModelId('   ')).toThrow('Missing model id')
    expect(() => parseGatewayStyleModelId('google/ ')).toThrow('Missing model name in "google/ "')
  })
})
