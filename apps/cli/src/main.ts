/**
 * loan-decision — evaluate one application against a policy document.
 *
 *   npm start -w @loan-decision/cli -- <policy-file> <application.json>
 *
 * Summaries go to stderr; the decision JSON goes to stdout.
 * Exit codes: 0 decision, 2 fallback decision, 1 usage or configuration error.
 */

import { readFile } from 'node:fs/promises'
import { parseArgs } from 'node:util'
import {
  loadConfig,
  createDecisionPipeline,
  validateApplication,
  isFallbackDecision,
  tryAsync,
} from '@loan-decision/core'
import { formatApplicationSummary, formatDecisionSummary } from './format.js'

const USAGE = 'Usage: npm start -w @loan-decision/cli -- <policy-file> <application.json>'

export async function main(argv: string[], env: Record<string, string | undefined>): Promise<number> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: { help: { type: 'boolean', short: 'h' } },
  })
  if (values.help || positionals.length !== 2) {
    console.error(USAGE)
    return values.help ? 0 : 1
  }
  const [policyPath, applicationPath] = positionals

  const config = loadConfig(env)
  if (!config.ok) {
    console.error(`[cli] ${config.error.message}`)
    return 1
  }

  const raw = await tryAsync(
    async () => JSON.parse(await readFile(applicationPath, 'utf-8')) as unknown,
    (err) => (err instanceof Error ? err.message : String(err)),
  )
  if (!raw.ok) {
    console.error(`[cli] could not read application ${applicationPath}: ${raw.error}`)
    return 1
  }

  const preview = validateApplication(raw.value)
  if (preview.ok) {
    console.error(formatApplicationSummary(preview.value))
  }

  console.error(`[cli] evaluating with ${config.value.provider}/${config.value.model}`)
  const pipeline = createDecisionPipeline(config.value)
  const result = await pipeline.evaluate(policyPath, raw.value)

  console.error('')
  console.error(formatDecisionSummary(result))
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`)
  return isFallbackDecision(result) ? 2 : 0
}
