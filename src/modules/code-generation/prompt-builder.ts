/**
 * Prompt construction for the generative provider.
 */

import type { DecodedAttachment, TaskCheck } from '../../core/types.js'
import { checkSource } from './element-specs.js'
import { parseDelimited, tabularDelimiter } from './tabular.js'
import type { ElementSpec, GenerationInput } from './types.js'

/** Rows of a tabular attachment shown to the model after the header */
export const PREVIEW_ROWS = 10

export interface PromptOptions {
  maxAttachmentChars: number
}

/**
 * One attachment as the model sees it: tables as header, row count and
 * leading rows; text verbatim up to the ceiling; binary by type and size.
 */
export function summarizeAttachment(attachment: DecodedAttachment, maxChars: number): string {
  const heading = `File: ${attachment.name} (${attachment.mimeType}, ${String(attachment.data.byteLength)} bytes)`
  const text = attachment.text

  if (text === undefined) {
    return `${heading}\nBinary content; reference it by file name if the page needs it.`
  }

  const delimiter = tabularDelimiter(attachment)
  if (delimiter !== undefined) {
    const rows = parseDelimited(text, delimiter)
    const [header, ...body] = rows
    const preview = body.slice(0, PREVIEW_ROWS).map((row) => row.join(delimiter))
    return [
      heading,
      `Columns: ${(header ?? []).join(', ')}`,
      `Data rows: ${String(body.length)}`,
      `First ${String(preview.length)} row(s):`,
      ...preview,
    ].join('\n')
  }

  if (text.length > maxChars) {
    return `${heading}\n${text.slice(0, maxChars)}\n... (truncated, ${String(text.length - maxChars)} more chars)`
  }
  return `${heading}\n${text}`
}

function describeElement(spec: ElementSpec): string {
  return spec.tag === undefined ? `- #${spec.id}` : `- <${spec.tag}> with id="${spec.id}"`
}

function describeCheck(check: TaskCheck, index: number): string {
  return `${String(index + 1)}. ${checkSource(check)}`
}

export function buildPrompt(input: GenerationInput, elements: ElementSpec[], options: PromptOptions): string {
  const parts: string[] = [
    `Create a complete, working single-page web application for the task "${input.taskName}" (round ${String(input.round)}).`,
    'Return ONLY the HTML document, starting with <!DOCTYPE html>. No explanations, no markdown.',
    '',
    'BRIEF:',
    input.brief,
  ]

  if (input.previousBriefs.length > 0) {
    parts.push('', 'EARLIER ROUNDS (keep their features working):')
    for (const previous of input.previousBriefs) {
      parts.push(`Round ${String(previous.round)}: ${previous.brief}`)
    }
  }

  if (input.attachments.length > 0) {
    parts.push('', 'ATTACHMENTS (embed any data the page needs directly in the document):')
    for (const attachment of input.attachments) {
      parts.push('', summarizeAttachment(attachment, options.maxAttachmentChars))
    }
  }

  if (elements.length > 0) {
    parts.push('', 'REQUIRED ELEMENTS (use exactly these ids):')
    parts.push(...elements.map(describeElement))
  }

  if (input.checks.length > 0) {
    parts.push('', 'THE PAGE MUST PASS THESE CHECKS:')
    parts.push(...input.checks.map(describeCheck))
  }

  parts.push(
    '',
    'RULES:',
    '- One HTML file with embedded CSS and JavaScript.',
    '- Put scripts before </body> and run them after DOMContentLoaded.',
    '- Well-known libraries may be loaded from a public CDN.',
    '- Every interactive element must work without a server.'
  )

  return parts.join('\n')
}
