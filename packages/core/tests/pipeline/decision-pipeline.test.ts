import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { DecisionPipeline, FALLBACK_RULE, isFallbackDecision } from '../../src/pipeline/index.js'
import type { PipelineStage } from '../../src/pipeline/index.js'
import type { LLMProvider } from '../../src/agents/index.js'
import { Ok, Err, LoanDecisionError } from '../../src/common/index.js'

// ── Helpers ──

const POLICY = 'Credit score >= 680 is low risk. Low risk DTI ceiling 40%.'

const APPROVAL = {
  decision: 'approved',
  reasoning: 'Credit score 700 is low risk; DTI 32.0% is within the 40% ceiling.',
  riskLevel: 'low',
  appliedRules: ['Credit score >= 680 is low risk', 'Low risk DTI ceiling 40%'],
}

function makeApplication(overrides: Record<string, unknown> = {}): Record<string, unknown> {
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

function makeProvider(impl: LLMProvider['chatComplete']) {
  const chatComplete = vi.fn<LLMProvider['chatComplete']>(impl)
  const provider: LLMProvider = { name: 'stub', chatComplete }
  return { provider, chatComplete }
}

function respondWith(text: string) {
  return makeProvider(async () => Ok(text))
}

function makePipeline(provider: LLMProvider, policyText = POLICY, stages: PipelineStage[] = []) {
  return new DecisionPipeline({
    provider,
    loadPolicy: async () => policyText,
    onStage: (event) => stages.push(event.stage),
  })
}

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

// ── Tests ──

describe('DecisionPipeline.evaluate', () => {
  it('returns a well-formed decision unchanged', async () => {
    const { provider, chatComplete } = respondWith(JSON.stringify(APPROVAL))
    const result = await makePipeline(provider).evaluate('loan_policy.pdf', makeApplication())

    expect(result).toEqual(APPROVAL)
    expect(isFallbackDecision(result)).toBe(false)
    expect(chatComplete).toHaveBeenCalledTimes(1)
  })

  it('sends the policy as system prompt and the application as the user message', async () => {
    const { provider, chatComplete } = respondWith(JSON.stringify(APPROVAL))
    await makePipeline(provider).evaluate('loan_policy.pdf', makeApplication())

    const [messages, systemPrompt] = chatComplete.mock.calls[0]
    expect(systemPrompt).toContain(POLICY)
    expect(messages).toHaveLength(1)
    expect(messages[0].role).toBe('user')
    expect(messages[0].content).toContain('- debtToIncomePercent: 32.0')
  })

  it('walks every stage in order on success', async () => {
    const stages: PipelineStage[] = []
    const { provider } = respondWith(JSON.stringify(APPROVAL))
    await makePipeline(provider, POLICY, stages).evaluate('loan_policy.pdf', makeApplication())

    expect(stages).toEqual(['start', 'policy_loaded', 'validated', 'prompted', 'service_invoked', 'parsed', 'done'])
  })

  it('falls back when the policy is unavailable, whatever the application', async () => {
    const stages: PipelineStage[] = []
    const { provider, chatComplete } = respondWith(JSON.stringify(APPROVAL))
    const pipeline = makePipeline(provider, '', stages)

    const expected = {
      decision: 'denied',
      reasoning: 'policy document unavailable',
      riskLevel: 'high',
      appliedRules: ['Error handling rule'],
    }
    expect(await pipeline.evaluate('missing.pdf', makeApplication())).toEqual(expected)
    expect(await pipeline.evaluate('missing.pdf', { applicantId: 42 })).toEqual(expected)
    expect(chatComplete).not.toHaveBeenCalled()
    expect(stages).toEqual(['start', 'fallback', 'start', 'fallback'])
  })

  it('falls back on invalid applications without calling the service', async () => {
    const { provider, chatComplete } = respondWith(JSON.stringify(APPROVAL))
    const result = await makePipeline(provider).evaluate('loan_policy.pdf', makeApplication({ annualIncome: 0 }))

    expect(result).toEqual({
      decision: 'denied',
      reasoning: 'Invalid loan application: annualIncome: must be greater than 0',
      riskLevel: 'high',
      appliedRules: [FALLBACK_RULE],
    })
    expect(chatComplete).not.toHaveBeenCalled()
  })

  it('falls back when the decision is outside the enum', async () => {
    const { provider } = respondWith(JSON.stringify({ ...APPROVAL, decision: 'maybe' }))
    const result = await makePipeline(provider).evaluate('loan_policy.pdf', makeApplication())

    expect(result.decision).toBe('denied')
    expect(result.riskLevel).toBe('high')
    expect(result.appliedRules).toEqual([FALLBACK_RULE])
    expect(result.reasoning).toMatch(/^Could not parse decision: decision: Invalid enum value/)
  })

  it('falls back on service errors', async () => {
    const { provider } = makeProvider(async () =>
      Err(LoanDecisionError.service('stub API error (429): rate limited', { retryable: true })),
    )
    const result = await makePipeline(provider).evaluate('loan_policy.pdf', makeApplication())

    expect(result.reasoning).toBe('Decision service error: stub API error (429): rate limited')
    expect(isFallbackDecision(result)).toBe(true)
  })

  it('falls back when a collaborator throws', async () => {
    const { provider } = makeProvider(async () => {
      throw new Error('socket closed')
    })
    const result = await makePipeline(provider).evaluate('loan_policy.pdf', makeApplication())

    expect(result.reasoning).toBe('Error processing application: socket closed')
  })

  it('falls back when the policy loader throws', async () => {
    const { provider } = respondWith(JSON.stringify(APPROVAL))
    const pipeline = new DecisionPipeline({
      provider,
      loadPolicy: async () => {
        throw new Error('disk unavailable')
      },
    })
    const result = await pipeline.evaluate('loan_policy.pdf', makeApplication())

    expect(result.reasoning).toBe('Error processing application: disk unavailable')
  })

  it('uses the file loader by default', async () => {
    const { provider, chatComplete } = respondWith(JSON.stringify(APPROVAL))
    const pipeline = new DecisionPipeline({ provider })
    const result = await pipeline.evaluate('/nonexistent/loan_policy.pdf', makeApplication())

    expect(result.reasoning).toBe('policy document unavailable')
    expect(chatComplete).not.toHaveBeenCalled()
  })

  it('survives a throwing stage hook', async () => {
    const { provider } = respondWith(JSON.stringify(APPROVAL))
    const pipeline = new DecisionPipeline({
      provider,
      loadPolicy: async () => POLICY,
      onStage: () => {
        throw new Error('listener bug')
      },
    })
    expect(await pipeline.evaluate('loan_policy.pdf', makeApplication())).toEqual(APPROVAL)
  })

  it('handles concurrent evaluations independently', async () => {
    const { provider } = makeProvider(async (messages) =>
      messages[0].content.includes('"applicantId": "APP_B"')
        ? Ok(JSON.stringify({ ...APPROVAL, decision: 'denied', riskLevel: 'medium' }))
        : Ok(JSON.stringify(APPROVAL)),
    )
    const pipeline = makePipeline(provider)

    const [a, b] = await Promise.all([
      pipeline.evaluate('loan_policy.pdf', makeApplication({ applicantId: 'APP_A' })),
      pipeline.evaluate('loan_policy.pdf', makeApplication({ applicantId: 'APP_B' })),
    ])

    expect(a.decision).toBe('approved')
    expect(b.decision).toBe('denied')
    expect(b.riskLevel).toBe('medium')
  })
})

describe('DecisionPipeline.evaluatePolicy', () => {
  it('skips loading and decides from the given text', async () => {
    const loadPolicy = vi.fn(async () => 'unused')
    const { provider, chatComplete } = respondWith(JSON.stringify(APPROVAL))
    const pipeline = new DecisionPipeline({ provider, loadPolicy })

    expect(await pipeline.evaluatePolicy(POLICY, makeApplication())).toEqual(APPROVAL)
    expect(loadPolicy).not.toHaveBeenCalled()
    expect(chatComplete.mock.calls[0][1]).toContain(POLICY)
  })

  it('treats empty text as an unavailable policy', async () => {
    const { provider } = respondWith(JSON.stringify(APPROVAL))
    const result = await new DecisionPipeline({ provider }).evaluatePolicy('', makeApplication())
    expect(result.reasoning).toBe('policy document unavailable')
  })

  it('treats whitespace-only text as an unavailable policy without calling the service', async () => {
    const { provider, chatComplete } = respondWith(JSON.stringify(APPROVAL))
    const result = await new DecisionPipeline({ provider }).evaluatePolicy('  \n\t ', makeApplication())
    expect(result).toEqual({
      decision: 'denied',
      reasoning: 'policy document unavailable',
      riskLevel: 'high',
      appliedRules: [FALLBACK_RULE],
    })
    expect(chatComplete).not.toHaveBeenCalled()
  })
})
