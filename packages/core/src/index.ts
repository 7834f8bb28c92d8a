/**
 * @loan-decision/core
 *
 * Evaluates a loan application against a free-text policy document through
 * one call to a text-generation service, returning a schema-checked decision.
 */

export * from './common/index.js'
export * from './applications/index.js'
export * from './documents/index.js'
export * from './prompts/index.js'
export * from './decisions/index.js'
export * from './agents/index.js'
export * from './pipeline/index.js'
export * from './config/index.js'
