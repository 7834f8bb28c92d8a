/**
 * Application validator — turns an untyped field mapping into an ApplicantRecord.
 */

import { Ok, Err, LoanDecisionError, formatZodIssues } from '../common/index.js'
import type { Result } from '../common/index.js'
import { ApplicantRecordSchema } from './schemas.js'
import type { ApplicantRecord } from './schemas.js'

/**
 * Validate raw applicant fields. No coercion: "75000" is not a number and
 * "yes" is not a boolean. Every offending field is reported, not just the first.
 */
export function validateApplication(raw: unknown): Result<ApplicantRecord, LoanDecisionError> {
  const parsed = ApplicantRecordSchema.safeParse(raw)
  if (!parsed.success) {
    return Err(LoanDecisionError.input(formatZodIssues(parsed.error)))
  }
  return Ok(Object.freeze(parsed.data))
}

/** Debt-to-income as a percentage: (monthlyDebt × 12) / annualIncome × 100. */
export function computeDebtToIncome(record: Pick<ApplicantRecord, 'monthlyDebt' | 'annualIncome'>): number {
  return ((record.monthlyDebt * 12) / record.annualIncome) * 100
}

/** DTI rendered with one decimal, e.g. "32.0". */
export function formatDebtToIncome(record: Pick<ApplicantRecord, 'monthlyDebt' | 'annualIncome'>): string {
  return computeDebtToIncome(record).toFixed(1)
}
