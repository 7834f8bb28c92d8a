/**
 * Common utilities — shared types, Result pattern, error handling.
 */

export { Ok, Err, tryAsync } from './result.js'
export type { Result } from './result.js'

export { LoanDecisionError } from './errors.js'
export type { ErrorCode, LoanDecisionErrorOptions } from './errors.js'

export { FiniteNumberSchema, formatZodIssues } from './schemas.js'
