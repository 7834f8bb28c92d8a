import { describe, it, expect } from 'vitest'
import {
  validateApplication,
  computeDebtToIncome,
  formatDebtToIncome,
} from '../../src/applications/index.js'

function makeRawApplication(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    applicantId: 'APP_USER_001',
    requestedAmount: 250000,
    annualIncome: 75000,
    monthlyDebt: 2000,
    creditScore: 700,
    employmentMonths: 24,
    isFirstTimeBuyer: false,
    isSelfEmployed: false,
    ...overrides,
  }
}

function issuesOf(raw: unknown): string[] {
  const result = validateApplication(raw)
  if (result.ok) throw new Error('expected validation to fail')
  expect(result.error.code).toBe('INPUT_ERROR')
  return result.error.issues
}

describe('validateApplication', () => {
  it('accepts a well-formed application', () => {
    const result = validateApplication(makeRawApplication())
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value).toEqual(makeRawApplication())
      expect(Object.isFrozen(result.value)).toBe(true)
    }
  })

  it('trims applicantId', () => {
    const result = validateApplication(makeRawApplication({ applicantId: '  APP-7  ' }))
    expect(result.ok && result.value.applicantId).toBe('APP-7')
  })

  it('rejects zero annual income', () => {
    expect(issuesOf(makeRawApplication({ annualIncome: 0 }))).toEqual(['annualIncome: must be greater than 0'])
  })

  it('rejects negative amounts', () => {
    expect(issuesOf(makeRawApplication({ requestedAmount: -1 }))).toEqual(['requestedAmount: must not be negative'])
  })

  it('rejects numeric strings instead of coercing them', () => {
    expect(issuesOf(makeRawApplication({ requestedAmount: '250000' }))).toEqual([
      'requestedAmount: Expected number, received string',
    ])
  })

  it('rejects non-boolean flags', () => {
    expect(issuesOf(makeRawApplication({ isFirstTimeBuyer: 'yes' }))).toEqual([
      'isFirstTimeBuyer: Expected boolean, received string',
    ])
  })

  it('reports missing required fields', () => {
    const raw = makeRawApplication()
    delete raw.creditScore
    expect(issuesOf(raw)).toEqual(['creditScore: Required'])
  })

  it('enforces integer credit score within range', () => {
    expect(issuesOf(makeRawApplication({ creditScore: 700.5 }))).toEqual(['creditScore: must be an integer'])
    expect(issuesOf(makeRawApplication({ creditScore: 900 }))).toEqual(['creditScore: must be at most 850'])
  })

  it('reports every offending field at once', () => {
    const issues = issuesOf(makeRawApplication({ monthlyDebt: -5, employmentMonths: 1.5 }))
    expect(issues).toEqual(['monthlyDebt: must not be negative', 'employmentMonths: must be an integer'])
  })

  it('rejects unknown fields', () => {
    expect(issuesOf(makeRawApplication({ nickname: 'bob' }))).toEqual([
      "(root): Unrecognized key(s) in object: 'nickname'",
    ])
  })

  it('rejects non-object input', () => {
    const result = validateApplication(null)
    expect(result.ok).toBe(false)
  })
})

describe('debt-to-income', () => {
  it('annualizes monthly debt against income', () => {
    expect(computeDebtToIncome({ monthlyDebt: 2000, annualIncome: 75000 })).toBeCloseTo(32, 10)
  })

  it('formats with one decimal', () => {
    expect(formatDebtToIncome({ monthlyDebt: 2000, annualIncome: 75000 })).toBe('32.0')
    expect(formatDebtToIncome({ monthlyDebt: 1500, annualIncome: 90000 })).toBe('20.0')
    expect(formatDebtToIncome({ monthlyDebt: 0, annualIncome: 50000 })).toBe('0.0')
  })
})
