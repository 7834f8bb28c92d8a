/**
 * Decision prompt builder — constructs system + user prompts for
 * evaluating one loan application against a policy document.
 *
 * Pure: the same (policy, application, schema) triple always renders
 * byte-identical text.
 */

import { APPLICANT_FIELDS, formatDebtToIncome } from '../applications/index.js'
import type { ApplicantRecord } from '../applications/index.js'

export interface DecisionPromptInput {
  policyText: string
  application: ApplicantRecord
  schemaDescription: string
}

export interface DecisionPrompt {
  system: string
  user: string
}

const DECISION_PROCEDURE = `Guidelines for decision making:
1. Calculate debt-to-income ratio: (monthlyDebt * 12) / annualIncome
2. Determine risk level based on credit score ranges in the policy
3. Apply appropriate DTI limits for the risk level
4. Check special cases (first-time buyer, self-employed) and apply the policy's adjustments
5. Provide clear reasoning for your decision and list every rule you applied`

export function buildDecisionPrompt(input: DecisionPromptInput): DecisionPrompt {
  return {
    system: buildSystemPrompt(input.policyText, input.schemaDescription),
    user: buildUserPrompt(input.application),
  }
}

function buildSystemPrompt(policyText: string, schemaDescription: string): string {
  return `You are a loan approval expert. You will receive a policy document and loan application data.

Your task:
1. Extract loan approval rules from the policy document
2. Apply those rules to the loan application
3. Make a decision with detailed reasoning

<policy_document>
${policyText}
</policy_document>

${schemaDescription}

${DECISION_PROCEDURE}`
}

function buildUserPrompt(application: ApplicantRecord): string {
  return `Loan Application Data:
${serializeApplication(application)}

Derived metrics:
- debtToIncomePercent: ${formatDebtToIncome(application)}

Please analyze the policy and make a loan decision.`
}

/** Indented JSON in canonical field order, independent of input key order. */
export function serializeApplication(application: ApplicantRecord): string {
  const ordered: Record<string, unknown> = {}
  for (const field of APPLICANT_FIELDS) {
    ordered[field] = application[field]
  }
  return JSON.stringify(ordered, null, 2)
}
