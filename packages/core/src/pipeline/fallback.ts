/**
 * Fallback decisions — same shape as a genuine DecisionResult, always
 * denied at high risk and marked with FALLBACK_RULE.
 */

import { createDecisionResult } from '../decisions/index.js'
import type { DecisionResult } from '../decisions/index.js'

export const FALLBACK_RULE = 'Error handling rule'

export const POLICY_UNAVAILABLE_REASONING = 'policy document unavailable'

export function buildFallbackDecision(reasoning: string): DecisionResult {
  return createDecisionResult({
    decision: 'denied',
    reasoning,
    riskLevel: 'high',
    appliedRules: [FALLBACK_RULE],
  })
}

/** True only for the exact shape buildFallbackDecision produces. */
export function isFallbackDecision(result: DecisionResult): boolean {
  return (
    result.decision === 'denied' &&
    result.riskLevel === 'high' &&
    result.appliedRules.length === 1 &&
    result.appliedRules[0] === FALLBACK_RULE
  )
}
