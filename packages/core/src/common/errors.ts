/**
 * Typed error class for loan decision operations.
 */

export type ErrorCode =
  | 'INPUT_ERROR'
  | 'DOCUMENT_ERROR'
  | 'SERVICE_ERROR'
  | 'PARSE_ERROR'
  | 'CONFIG_ERROR'

export interface LoanDecisionErrorOptions {
  /** Individual violations, e.g. `annualIncome: must be greater than 0`. */
  issues?: string[]
  /** Whether a retry of the same call may succeed (transient service failures). */
  retryable?: boolean
  cause?: unknown
}

export class LoanDecisionError extends Error {
  readonly code: ErrorCode
  readonly issues: string[]
  readonly retryable: boolean

  constructor(code: ErrorCode, message: string, options: LoanDecisionErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'LoanDecisionError'
    this.code = code
    this.issues = options.issues ?? []
    this.retryable = options.retryable ?? false
  }

  static input(issues: string[]): LoanDecisionError {
    return new LoanDecisionError('INPUT_ERROR', issues.join('; '), { issues })
  }

  static document(message: string, cause?: unknown): LoanDecisionError {
    return new LoanDecisionError('DOCUMENT_ERROR', message, { cause })
  }

  static service(message: string, options: { retryable?: boolean; cause?: unknown } = {}): LoanDecisionError {
    return new LoanDecisionError('SERVICE_ERROR', message, options)
  }

  static parse(issues: string[]): LoanDecisionError {
    return new LoanDecisionError('PARSE_ERROR', issues.join('; '), { issues })
  }

  static config(message: string): LoanDecisionError {
    return new LoanDecisionError('CONFIG_ERROR', message)
  }
}
