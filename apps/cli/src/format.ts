/**
 * Plain-text summaries printed alongside the decision JSON.
 */

import { formatDebtToIncome, isFallbackDecision } from '@loan-decision/core'
import type { ApplicantRecord, DecisionResult } from '@loan-decision/core'

const currency = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
})

const yesNo = (flag: boolean): string => (flag ? 'Yes' : 'No')

export function formatApplicationSummary(application: ApplicantRecord): string {
  return [
    'Application Summary:',
    '-'.repeat(25),
    `Applicant ID: ${application.applicantId}`,
    `Requested Amount: ${currency.format(application.requestedAmount)}`,
    `Annual Income: ${currency.format(application.annualIncome)}`,
    `Monthly Debt: ${currency.format(application.monthlyDebt)}`,
    `Debt-to-Income: ${formatDebtToIncome(application)}%`,
    `Credit Score: ${application.creditScore}`,
    `Employment: ${application.employmentMonths} months`,
    `First-time Buyer: ${yesNo(application.isFirstTimeBuyer)}`,
    `Self-employed: ${yesNo(application.isSelfEmployed)}`,
  ].join('\n')
}

export function formatDecisionSummary(result: DecisionResult): string {
  const lines = [
    `Decision: ${result.decision.toUpperCase()}${isFallbackDecision(result) ? ' (fallback)' : ''}`,
    `Risk Level: ${result.riskLevel.toUpperCase()}`,
    `Applied Rules: ${result.appliedRules.length} rules`,
    '',
    'Reasoning:',
    result.reasoning,
    '',
    'Applied Rules:',
    ...result.appliedRules.map((rule, i) => `   ${i + 1}. ${rule}`),
  ]
  return lines.join('\n')
}
