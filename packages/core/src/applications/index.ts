export { ApplicantRecordSchema, APPLICANT_FIELDS } from './schemas.js'
export type { ApplicantRecord } from './schemas.js'
export { validateApplication, computeDebtToIncome, formatDebtToIncome } from './validator.js'
