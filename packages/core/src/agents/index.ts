/**
 * Agents — decision service providers.
 * Handles API calls (BYOK) and the retry policy around them.
 */

export type { ChatMessage, LLMProvider } from './provider.js'
export { DECISION_TEMPERATURE, isRetryableStatus } from './provider.js'

export { AnthropicProvider } from './anthropic-provider.js'
export type { AnthropicProviderOptions } from './anthropic-provider.js'
export { OpenAIProvider } from './openai-provider.js'
export type { OpenAIProviderOptions } from './openai-provider.js'
export { OllamaProvider, normalizeOllamaUrl } from './ollama-provider.js'
export type { OllamaProviderOptions } from './ollama-provider.js'

export { createProvider, DEFAULT_MODELS, PROVIDER_NAMES } from './provider-factory.js'
export type { ProviderName, ProviderConfig } from './provider-factory.js'

export { withRetry, computeBackoffDelay, DEFAULT_RETRY_POLICY } from './retry.js'
export type { RetryPolicy, RetryDeps } from './retry.js'
