/**
 * Anthropic (Claude) implementation of the LLM provider interface.
 */

import Anthropic from '@anthropic-ai/sdk'
import { Ok, Err } from '../common/index.js'
import { LoanDecisionError } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { ChatMessage, LLMProvider } from './provider.js'
import { DECISION_TEMPERATURE, isRetryableStatus } from './provider.js'

export interface AnthropicProviderOptions {
  apiKey: string
  model?: string
  maxTokens?: number
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic'
  private readonly client: Anthropic
  private readonly model: string
  private readonly maxTokens: number

  constructor(options: AnthropicProviderOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 })
    this.model = options.model ?? 'claude-sonnet-4-20250514'
    this.maxTokens = options.maxTokens ?? 1024
  }

  async chatComplete(
    messages: ChatMessage[],
    systemPrompt: string,
  ): Promise<Result<string, LoanDecisionError>> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: DECISION_TEMPERATURE,
        system: systemPrompt,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
      })

      const textBlock = response.content.find((block) => block.type === 'text')
      if (!textBlock || textBlock.type !== 'text' || !textBlock.text) {
        return Err(LoanDecisionError.service('No text content in response'))
      }

      return Ok(textBlock.text)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      if (error instanceof Anthropic.APIConnectionError) {
        return Err(LoanDecisionError.service(`anthropic connection failed: ${message}`, { retryable: true, cause: error }))
      }
      if (error instanceof Anthropic.APIError) {
        return Err(
          LoanDecisionError.service(`anthropic API error (${error.status ?? 'unknown'}): ${message}`, {
            retryable: isRetryableStatus(error.status),
            cause: error,
          }),
        )
      }
      return Err(LoanDecisionError.service(message, { cause: error }))
    }
  }
}
