/**
 * Decision pipeline — sequences policy loading, validation, prompting,
 * the service call and parsing for one application.
 *
 *   start → policy_loaded → validated → prompted → service_invoked → parsed → done
 *
 * Any failure moves to the terminal `fallback` stage. evaluate() never rejects:
 * callers always receive a DecisionResult.
 *
 * Holds only immutable collaborators, so one instance may serve concurrent calls.
 */

import { validateApplication } from '../applications/index.js'
import { parseDecision, describeDecisionSchema } from '../decisions/index.js'
import type { DecisionResult } from '../decisions/index.js'
import { loadPolicyText } from '../documents/index.js'
import { buildDecisionPrompt } from '../prompts/index.js'
import type { LLMProvider } from '../agents/index.js'
import { buildFallbackDecision, POLICY_UNAVAILABLE_REASONING } from './fallback.js'

export type PipelineStage =
  | 'start'
  | 'policy_loaded'
  | 'validated'
  | 'prompted'
  | 'service_invoked'
  | 'parsed'
  | 'done'
  | 'fallback'

export interface PipelineStageEvent {
  stage: PipelineStage
  applicantId?: string
  /** Fallback reasoning, or a short note for the stage. */
  detail?: string
}

export interface DecisionPipelineDeps {
  provider: LLMProvider
  /** Returns '' when no policy is available. Defaults to loadPolicyText. */
  loadPolicy?: (documentPath: string) => Promise<string>
  onStage?: (event: PipelineStageEvent) => void
}

export class DecisionPipeline {
  private readonly provider: LLMProvider
  private readonly loadPolicy: (documentPath: string) => Promise<string>
  private readonly onStage: (event: PipelineStageEvent) => void
  private readonly schemaDescription = describeDecisionSchema()

  constructor(deps: DecisionPipelineDeps) {
    this.provider = deps.provider
    this.loadPolicy = deps.loadPolicy ?? loadPolicyText
    this.onStage = deps.onStage ?? (() => {})
  }

  async evaluate(documentPath: string, rawApplication: unknown): Promise<DecisionResult> {
    this.emit({ stage: 'start' })
    let policyText: string
    try {
      policyText = await this.loadPolicy(documentPath)
    } catch (err) {
      return this.fallback(`Error processing application: ${errorMessage(err)}`)
    }
    return this.decide(policyText, rawApplication)
  }

  /** Same pipeline for callers that already hold the policy text (e.g. a batch over one policy). */
  async evaluatePolicy(policyText: string, rawApplication: unknown): Promise<DecisionResult> {
    this.emit({ stage: 'start' })
    return this.decide(policyText, rawApplication)
  }

  private async decide(policyText: string, rawApplication: unknown): Promise<DecisionResult> {
    if (policyText.trim().length === 0) {
      return this.fallback(POLICY_UNAVAILABLE_REASONING)
    }
    this.emit({ stage: 'policy_loaded', detail: `${policyText.length} characters` })

    const validation = validateApplication(rawApplication)
    if (!validation.ok) {
      return this.fallback(`Invalid loan application: ${validation.error.message}`)
    }
    const application = validation.value
    const applicantId = application.applicantId
    this.emit({ stage: 'validated', applicantId })

    try {
      const prompt = buildDecisionPrompt({
        policyText,
        application,
        schemaDescription: this.schemaDescription,
      })
      this.emit({ stage: 'prompted', applicantId })

      const response = await this.provider.chatComplete([{ role: 'user', content: prompt.user }], prompt.system)
      if (!response.ok) {
        return this.fallback(`Decision service error: ${response.error.message}`, applicantId)
      }
      this.emit({ stage: 'service_invoked', applicantId, detail: this.provider.name })

      const parsed = parseDecision(response.value)
      if (!parsed.ok) {
        return this.fallback(`Could not parse decision: ${parsed.error.message}`, applicantId)
      }
      this.emit({ stage: 'parsed', applicantId })

      this.emit({ stage: 'done', applicantId, detail: parsed.value.decision })
      return parsed.value
    } catch (err) {
      return this.fallback(`Error processing application: ${errorMessage(err)}`, applicantId)
    }
  }

  private fallback(reasoning: string, applicantId?: string): DecisionResult {
    console.warn(`[pipeline] fallback applicant=${applicantId ?? 'unknown'}: ${reasoning}`)
    this.emit({ stage: 'fallback', applicantId, detail: reasoning })
    return buildFallbackDecision(reasoning)
  }

  private emit(event: PipelineStageEvent): void {
    console.info(`[pipeline] stage=${event.stage}${event.applicantId ? ` applicant=${event.applicantId}` : ''}`)
    try {
      this.onStage(event)
    } catch (err) {
      console.warn(`[pipeline] onStage hook failed at ${event.stage}: ${errorMessage(err)}`)
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
