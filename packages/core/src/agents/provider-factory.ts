/**
 * Provider factory — creates LLM provider instances from configuration.
 */

import type { LLMProvider } from './provider.js'
import { AnthropicProvider } from './anthropic-provider.js'
import { OpenAIProvider } from './openai-provider.js'
import { OllamaProvider } from './ollama-provider.js'

export const PROVIDER_NAMES = ['openai', 'anthropic', 'ollama'] as const
export type ProviderName = typeof PROVIDER_NAMES[number]

export interface ProviderConfig {
  provider: ProviderName
  model?: string
  apiKey?: string
  ollamaBaseUrl?: string
  maxTokens?: number
}

/** Default model per provider — used when no override is configured. */
export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-sonnet-4-20250514',
  ollama: 'llama3.1',
}

/**
 * Create a provider instance from configuration.
 * Throws if required fields are missing (e.g., apiKey for non-Ollama providers).
 */
export function createProvider(config: ProviderConfig): LLMProvider {
  const model = config.model ?? DEFAULT_MODELS[config.provider]
  switch (config.provider) {
    case 'openai': {
      if (!config.apiKey) throw new Error('OpenAI API key is required')
      return new OpenAIProvider({ apiKey: config.apiKey, model, maxTokens: config.maxTokens })
    }
    case 'anthropic': {
      if (!config.apiKey) throw new Error('Anthropic API key is required')
      return new AnthropicProvider({ apiKey: config.apiKey, model, maxTokens: config.maxTokens })
    }
    case 'ollama': {
      return new OllamaProvider({ model, baseUrl: config.ollamaBaseUrl, maxTokens: config.maxTokens })
    }
    default: {
      const _exhaustive: never = config.provider
      throw new Error(`Unknown provider: ${_exhaustive}`)
    }
  }
}
