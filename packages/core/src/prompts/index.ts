export { buildDecisionPrompt, serializeApplication } from './prompt-builder.js'
export type { DecisionPromptInput, DecisionPrompt } from './prompt-builder.js'
