/**
 * Configuration — parsed once at startup from an explicit environment record.
 * The pipeline receives the resulting values; it never reads process.env.
 */

import { z } from 'zod'
import { Ok, Err, LoanDecisionError, formatZodIssues } from '../common/index.js'
import type { Result } from '../common/index.js'
import { PROVIDER_NAMES, DEFAULT_MODELS, createProvider, withRetry, DEFAULT_RETRY_POLICY } from '../agents/index.js'
import type { ProviderName, RetryPolicy } from '../agents/index.js'
import { DecisionPipeline } from '../pipeline/index.js'
import type { DecisionPipelineDeps } from '../pipeline/index.js'

const optionalString = z
  .string()
  .transform((s) => s.trim())
  .optional()
  .transform((s) => (s ? s : undefined))

const EnvSchema = z.object({
  LOAN_DECISION_PROVIDER: z.enum(PROVIDER_NAMES).default('openai'),
  LOAN_DECISION_MODEL: optionalString,
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  OLLAMA_BASE_URL: optionalString,
  LOAN_DECISION_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  LOAN_DECISION_MAX_RETRIES: z.coerce.number().int().nonnegative().max(10).default(DEFAULT_RETRY_POLICY.maxRetries),
  LOAN_DECISION_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.baseDelayMs),
})

export interface LoanDecisionConfig {
  provider: ProviderName
  model: string
  apiKey?: string
  ollamaBaseUrl?: string
  maxTokens: number
  retry: RetryPolicy
}

const API_KEY_VARS: Record<ProviderName, 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY' | null> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  ollama: null,
}

export function loadConfig(env: Record<string, string | undefined>): Result<LoanDecisionConfig, LoanDecisionError> {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    return Err(LoanDecisionError.config(`Invalid configuration: ${formatZodIssues(parsed.error).join('; ')}`))
  }
  const vars = parsed.data

  const keyVar = API_KEY_VARS[vars.LOAN_DECISION_PROVIDER]
  const apiKey = keyVar ? vars[keyVar] : undefined
  if (keyVar && !apiKey) {
    return Err(LoanDecisionError.config(`${keyVar} is required for provider ${vars.LOAN_DECISION_PROVIDER}`))
  }

  return Ok({
    provider: vars.LOAN_DECISION_PROVIDER,
    model: vars.LOAN_DECISION_MODEL ?? DEFAULT_MODELS[vars.LOAN_DECISION_PROVIDER],
    apiKey,
    ollamaBaseUrl: vars.OLLAMA_BASE_URL,
    maxTokens: vars.LOAN_DECISION_MAX_TOKENS,
    retry: {
      ...DEFAULT_RETRY_POLICY,
      maxRetries: vars.LOAN_DECISION_MAX_RETRIES,
      baseDelayMs: vars.LOAN_DECISION_RETRY_BASE_MS,
    },
  })
}

/** Wire a pipeline from config: provider from the factory, wrapped in the retry policy. */
export function createDecisionPipeline(
  config: LoanDecisionConfig,
  deps: Omit<DecisionPipelineDeps, 'provider'> = {},
): DecisionPipeline {
  const provider = createProvider({
    provider: config.provider,
    model: config.model,
    apiKey: config.apiKey,
    ollamaBaseUrl: config.ollamaBaseUrl,
    maxTokens: config.maxTokens,
  })
  return new DecisionPipeline({ ...deps, provider: withRetry(provider, config.retry) })
}
