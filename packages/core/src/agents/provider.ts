/**
 * LLM provider interface — the decision service capability.
 *
 * The pipeline only depends on this contract, so tests substitute an
 * in-process stub and production wires a network client.
 */

import type { Result } from '../common/index.js'
import type { LoanDecisionError } from '../common/index.js'

export interface ChatMessage {
  role: 'user' | 'assistant'
  content: string
}

export interface LLMProvider {
  name: string
  /**
   * Send one prompt and return the full response text.
   * Every failure (transport, auth, rate limit, empty response) is an Err with code SERVICE_ERROR.
   */
  chatComplete(messages: ChatMessage[], systemPrompt: string): Promise<Result<string, LoanDecisionError>>
}

/** Decisions must be reproducible for the same prompt. */
export const DECISION_TEMPERATURE = 0

/** Statuses worth retrying: timeout, conflict, rate limit, server errors. */
export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return false
  return status === 408 || status === 409 || status === 429 || status >= 500
}
