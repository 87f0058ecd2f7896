/**
 * HTML document extraction from model output, and escaping helpers.
 */

export type DocumentExtraction =
  | { ok: true; html: string }
  | { ok: false; reason: 'EMPTY_RESPONSE' | 'MALFORMED_DOCUMENT' | 'DOCUMENT_TOO_SHORT'; detail: string }

const FENCED_BLOCK = /```[a-zA-Z]*[ \t]*\r?\n([\s\S]*?)```/g
const DOCUMENT_START = /<!doctype\s+html[^>]*>|<html[\s>]/i

/**
 * Pull a complete HTML document out of a model response.
 *
 * Code fences are unwrapped (the fenced block that holds an `<html>` wins),
 * prose before the doctype/`<html>` and after the last `</html>` is cut, and
 * a doctype is prefixed when missing. The result must contain a `<body>` and
 * be at least `minChars` long.
 */
export function extractHtmlDocument(raw: string, minChars: number): DocumentExtraction {
  let text = raw.trim()
  if (text === '') {
    return { ok: false, reason: 'EMPTY_RESPONSE', detail: 'provider returned no text' }
  }

  const blocks = [...text.matchAll(FENCED_BLOCK)].map((m) => m[1] ?? '')
  const documentBlock = blocks.find((block) => DOCUMENT_START.test(block))
  if (documentBlock !== undefined) {
    text = documentBlock
  } else {
    // An unterminated fence: drop the fence markers themselves
    text = text.replace(/^```[a-zA-Z]*[ \t]*\r?\n?/, '').replace(/\r?\n?```\s*$/, '')
  }

  const start = DOCUMENT_START.exec(text)
  if (start === null) {
    return { ok: false, reason: 'MALFORMED_DOCUMENT', detail: 'no <html> element' }
  }
  text = text.slice(start.index)

  const end = text.toLowerCase().lastIndexOf('</html>')
  if (end === -1) {
    return { ok: false, reason: 'MALFORMED_DOCUMENT', detail: 'no closing </html> tag' }
  }
  text = text.slice(0, end + '</html>'.length)

  if (!/<body[\s>]/i.test(text)) {
    return { ok: false, reason: 'MALFORMED_DOCUMENT', detail: 'no <body> element' }
  }

  if (!/^<!doctype/i.test(text)) {
    text = `<!DOCTYPE html>\n${text}`
  }

  if (text.length < minChars) {
    return {
      ok: false,
      reason: 'DOCUMENT_TOO_SHORT',
      detail: `document has ${String(text.length)} chars, need ${String(minChars)}`,
    }
  }

  return { ok: true, html: text }
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch)
}
