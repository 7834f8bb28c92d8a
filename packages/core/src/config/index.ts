export { loadConfig, createDecisionPipeline } from './config.js'
export type { LoanDecisionConfig } from './config.js'
