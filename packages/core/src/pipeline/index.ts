export { DecisionPipeline } from './decision-pipeline.js'
export type { DecisionPipelineDeps, PipelineStage, PipelineStageEvent } from './decision-pipeline.js'
export {
  buildFallbackDecision,
  isFallbackDecision,
  FALLBACK_RULE,
  POLICY_UNAVAILABLE_REASONING,
} from './fallback.js'
