/**
 * Decision output parser — extracts the JSON object from model text and
 * validates it field by field. Enum values are matched exactly; nothing is coerced.
 */

import { Ok, Err, LoanDecisionError, formatZodIssues } from '../common/index.js'
import type { Result } from '../common/index.js'
import { DecisionResultSchema } from './schemas.js'
import type { DecisionResult } from './schemas.js'

// First fenced block, with or without a json language tag; the body may start on the fence line
const FENCE_RE = /```(?:json)?[ \t]*\r?\n?([\s\S]*?)```/i

export function extractJsonPayload(rawText: string): string {
  const fence = rawText.match(FENCE_RE)
  return (fence ? fence[1] : rawText).trim()
}

export function parseDecision(rawText: string): Result<DecisionResult, LoanDecisionError> {
  const payload = extractJsonPayload(rawText)
  if (!payload) {
    return Err(LoanDecisionError.parse(['response is empty']))
  }

  let json: unknown
  try {
    json = JSON.parse(payload)
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e)
    return Err(LoanDecisionError.parse([`response is not valid JSON: ${message}`]))
  }

  const parsed = DecisionResultSchema.safeParse(json)
  if (!parsed.success) {
    return Err(LoanDecisionError.parse(formatZodIssues(parsed.error)))
  }

  const { decision, reasoning, riskLevel, appliedRules } = parsed.data
  return Ok(createDecisionResult({ decision, reasoning, riskLevel, appliedRules }))
}

/** Freeze a decision, including its rule list. */
export function createDecisionResult(fields: DecisionResult): DecisionResult {
  return Object.freeze({
    decision: fields.decision,
    reasoning: fields.reasoning,
    riskLevel: fields.riskLevel,
    appliedRules: Object.freeze([...fields.appliedRules]),
  })
}
