export {
  DECISION_VALUES,
  RISK_LEVELS,
  DecisionSchema,
  RiskLevelSchema,
  DecisionResultSchema,
  DECISION_JSON_SCHEMA,
  describeDecisionSchema,
} from './schemas.js'
export type { Decision, RiskLevel, DecisionResult } from './schemas.js'
export { parseDecision, extractJsonPayload, createDecisionResult } from './output-parser.js'
