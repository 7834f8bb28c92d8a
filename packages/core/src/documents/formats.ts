/**
 * Policy document formats and text extraction.
 */

import { extname } from 'node:path'

export type PolicyFormat = 'pdf' | 'docx' | 'text'

const EXTENSION_FORMATS: Record<string, PolicyFormat> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.txt': 'text',
  '.md': 'text',
}

export function resolvePolicyFormat(filePath: string): PolicyFormat | null {
  const ext = extname(filePath.trim()).toLowerCase()
  return EXTENSION_FORMATS[ext] ?? null
}

/**
 * Extract raw text from a policy document buffer.
 * PDF pages are joined with a blank line between them.
 */
export async function extractPolicyText(format: PolicyFormat, buf: Buffer): Promise<string> {
  switch (format) {
    case 'pdf': {
      const { getDocumentProxy, extractText } = await import('unpdf')
      const pdf = await getDocumentProxy(new Uint8Array(buf))
      const { text } = await extractText(pdf, { mergePages: false })
      return Array.isArray(text) ? text.join('\n\n') : text
    }
    case 'docx': {
      const { default: mammoth } = await import('mammoth')
      const result = await mammoth.extractRawText({ buffer: buf })
      return result.value
    }
    case 'text':
      return buf.toString('utf-8')
    default: {
      const _exhaustive: never = format
      throw new Error(`Unsupported format: ${_exhaustive}`)
    }
  }
}
