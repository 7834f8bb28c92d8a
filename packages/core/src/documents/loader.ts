/**
 * Policy document loader.
 *
 * readPolicyDocument() reports why a document could not be used;
 * loadPolicyText() collapses every failure to the empty-string sentinel
 * the decision pipeline treats as "no policy available".
 */

import { readFile } from 'node:fs/promises'
import { Ok, Err, LoanDecisionError, tryAsync } from '../common/index.js'
import type { Result } from '../common/index.js'
import { resolvePolicyFormat, extractPolicyText } from './formats.js'

export async function readPolicyDocument(filePath: string): Promise<Result<string, LoanDecisionError>> {
  const format = resolvePolicyFormat(filePath)
  if (!format) {
    return Err(LoanDecisionError.document(`Unsupported policy format: ${filePath}`))
  }

  const buf = await tryAsync(
    () => readFile(filePath),
    (err) => LoanDecisionError.document(`Policy document not readable: ${filePath}`, err),
  )
  if (!buf.ok) return buf

  const text = await tryAsync(
    () => extractPolicyText(format, buf.value),
    (err) =>
      LoanDecisionError.document(
        `Failed to extract text from ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
        err,
      ),
  )
  if (!text.ok) return text

  if (text.value.trim().length === 0) {
    return Err(LoanDecisionError.document(`Policy document is empty: ${filePath}`))
  }
  return Ok(text.value)
}

export async function loadPolicyText(filePath: string): Promise<string> {
  const result = await readPolicyDocument(filePath)
  if (!result.ok) {
    console.warn(`[policy-loader] ${result.error.message}`)
    return ''
  }
  console.info(`[policy-loader] loaded policy document: ${result.value.length} characters`)
  return result.value
}
