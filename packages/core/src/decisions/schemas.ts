/**
 * Decision result schema: the zod validator plus the JSON Schema
 * description embedded in the prompt.
 */

import { z } from 'zod'

export const DECISION_VALUES = ['approved', 'denied'] as const
export const RISK_LEVELS = ['low', 'medium', 'high'] as const

export const DecisionSchema = z.enum(DECISION_VALUES)
export type Decision = z.infer<typeof DecisionSchema>

export const RiskLevelSchema = z.enum(RISK_LEVELS)
export type RiskLevel = z.infer<typeof RiskLevelSchema>

export const DecisionResultSchema = z.object({
  decision: DecisionSchema,
  reasoning: z.string(),
  riskLevel: RiskLevelSchema,
  appliedRules: z.array(z.string()),
})

export interface DecisionResult {
  readonly decision: Decision
  readonly reasoning: string
  readonly riskLevel: RiskLevel
  readonly appliedRules: readonly string[]
}

export const DECISION_JSON_SCHEMA = {
  title: 'LoanDecision',
  type: 'object',
  properties: {
    decision: {
      type: 'string',
      enum: [...DECISION_VALUES],
      description: "Either 'approved' or 'denied'",
    },
    reasoning: {
      type: 'string',
      description: 'Detailed explanation of the decision',
    },
    riskLevel: {
      type: 'string',
      enum: [...RISK_LEVELS],
      description: "Risk level: 'low', 'medium', or 'high'",
    },
    appliedRules: {
      type: 'array',
      items: { type: 'string' },
      description: 'List of rules that were applied',
    },
  },
  required: ['decision', 'reasoning', 'riskLevel', 'appliedRules'],
} as const

/** Output-format instructions for the model. Stable across calls. */
export function describeDecisionSchema(): string {
  return [
    'The output should be formatted as a JSON instance that conforms to the JSON schema below.',
    'Respond with the JSON object only, optionally inside a ```json fence. Do not add any other text.',
    '',
    'Here is the output schema:',
    '```json',
    JSON.stringify(DECISION_JSON_SCHEMA, null, 2),
    '```',
  ].join('\n')
}
