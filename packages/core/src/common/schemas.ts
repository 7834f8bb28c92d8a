/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

/** Number that is neither NaN nor ±Infinity. */
export const FiniteNumberSchema = z.number().finite()

/** Flattens zod issues into `path: message` strings, one per violation. */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${path}: ${issue.message}`
  })
}
