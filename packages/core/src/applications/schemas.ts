/**
 * Zod schemas and types for loan applications.
 */

import { z } from 'zod'
import { FiniteNumberSchema } from '../common/index.js'

export const ApplicantRecordSchema = z
  .object({
    applicantId: z.string().trim().min(1, 'must not be empty'),
    requestedAmount: FiniteNumberSchema.nonnegative('must not be negative'),
    annualIncome: FiniteNumberSchema.positive('must be greater than 0'),
    monthlyDebt: FiniteNumberSchema.nonnegative('must not be negative'),
    creditScore: FiniteNumberSchema.int('must be an integer')
      .min(300, 'must be at least 300')
      .max(850, 'must be at most 850'),
    employmentMonths: FiniteNumberSchema.int('must be an integer').nonnegative('must not be negative'),
    isFirstTimeBuyer: z.boolean(),
    isSelfEmployed: z.boolean(),
  })
  .strict()

export type ApplicantRecord = Readonly<z.infer<typeof ApplicantRecordSchema>>

/** Field order used wherever an application is serialized. */
export const APPLICANT_FIELDS = [
  'applicantId',
  'requestedAmount',
  'annualIncome',
  'monthlyDebt',
  'creditScore',
  'employmentMonths',
  'isFirstTimeBuyer',
  'isSelfEmployed',
] as const satisfies ReadonlyArray<keyof ApplicantRecord>
