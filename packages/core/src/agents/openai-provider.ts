/**
 * OpenAI implementation of the LLM provider interface.
 *
 * Also serves as base class for OllamaProvider (OpenAI-compatible API).
 */

import OpenAI from 'openai'
import { Ok, Err } from '../common/index.js'
import { LoanDecisionError } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { ChatMessage, LLMProvider } from './provider.js'
import { DECISION_TEMPERATURE, isRetryableStatus } from './provider.js'

export interface OpenAIProviderOptions {
  apiKey: string
  model?: string
  maxTokens?: number
  baseUrl?: string
}

export class OpenAIProvider implements LLMProvider {
  readonly name: string = 'openai'
  protected readonly client: OpenAI
  protected readonly model: string
  protected readonly maxTokens: number

  constructor(options: OpenAIProviderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      // Retries belong to withRetry(), not the SDK
      maxRetries: 0,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    })
    this.model = options.model ?? 'gpt-4o'
    this.maxTokens = options.maxTokens ?? 1024
  }

  async chatComplete(
    messages: ChatMessage[],
    systemPrompt: string,
  ): Promise<Result<string, LoanDecisionError>> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: DECISION_TEMPERATURE,
        messages: [
          { role: 'system', content: systemPrompt },
          ...messages.map((m) => ({ role: m.role, content: m.content })),
        ],
      })

      const content = response.choices?.[0]?.message?.content
      if (!content) {
        return Err(LoanDecisionError.service('No text content in response'))
      }

      return Ok(content)
    } catch (error) {
      return Err(toServiceError(this.name, error))
    }
  }
}

function toServiceError(providerName: string, error: unknown): LoanDecisionError {
  const message = error instanceof Error ? error.message : String(error)
  // APIConnectionError extends APIError with no status, so check it first
  if (error instanceof OpenAI.APIConnectionError) {
    return LoanDecisionError.service(`${providerName} connection failed: ${message}`, { retryable: true, cause: error })
  }
  if (error instanceof OpenAI.APIError) {
    return LoanDecisionError.service(`${providerName} API error (${error.status ?? 'unknown'}): ${message}`, {
      retryable: isRetryableStatus(error.status),
      cause: error,
    })
  }
  return LoanDecisionError.service(message, { cause: error })
}
