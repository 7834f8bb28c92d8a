/**
 * Bounded retry with jittered exponential backoff around any LLMProvider.
 * Only SERVICE_ERRORs flagged retryable are attempted again.
 */

import type { Result } from '../common/index.js'
import type { LoanDecisionError } from '../common/index.js'
import type { ChatMessage, LLMProvider } from './provider.js'

export interface RetryPolicy {
  /** Extra attempts after the first call. 0 disables retrying. */
  maxRetries: number
  baseDelayMs: number
  maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
}

export interface RetryDeps {
  sleep?: (ms: number) => Promise<void>
  /** Returns a value in [0, 1). */
  random?: () => number
}

/** Delay before retry number `attempt` (0-based): capped exponential, scaled into [50%, 100%). */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt))
  return Math.round(exponential * (0.5 + random() / 2))
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

export function withRetry(provider: LLMProvider, policy: RetryPolicy, deps: RetryDeps = {}): LLMProvider {
  const sleep = deps.sleep ?? defaultSleep
  const random = deps.random ?? Math.random

  return {
    name: provider.name,
    async chatComplete(messages: ChatMessage[], systemPrompt: string): Promise<Result<string, LoanDecisionError>> {
      let result = await provider.chatComplete(messages, systemPrompt)
      for (let attempt = 0; attempt < policy.maxRetries; attempt++) {
        if (result.ok || !result.error.retryable) return result
        const delayMs = computeBackoffDelay(attempt, policy, random)
        console.warn(
          `[retry] provider=${provider.name} attempt=${attempt + 2}/${policy.maxRetries + 1} delayMs=${delayMs} reason=${result.error.message}`,
        )
        await sleep(delayMs)
        result = await provider.chatComplete(messages, systemPrompt)
      }
      return result
    },
  }
}
