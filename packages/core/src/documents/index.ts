export { resolvePolicyFormat, extractPolicyText } from './formats.js'
export type { PolicyFormat } from './formats.js'
export { readPolicyDocument, loadPolicyText } from './loader.js'
