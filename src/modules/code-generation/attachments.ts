/**
 * Decoding of `data:` URL attachments.
 */

import type { AttachmentRef, DecodedAttachment } from '../../core/types.js'

const TEXT_MIME_TYPES = new Set([
  'application/json',
  'application/xml',
  'application/javascript',
  'application/x-ndjson',
  'image/svg+xml',
])

const TEXT_EXTENSIONS = new Set(['.csv', '.tsv', '.txt', '.md', '.json', '.xml', '.html', '.js', '.css', '.svg'])

export interface SkippedAttachment {
  name: string
  reason: string
}

export interface DecodeResult {
  attachments: DecodedAttachment[]
  skipped: SkippedAttachment[]
}

/**
 * Decode a `data:` URL into its media type and bytes.
 * @throws {Error} if the URL is not a well-formed data URL.
 */
export function parseDataUrl(url: string): { mimeType: string; data: Uint8Array } {
  const match = /^data:([^,]*),([\s\S]*)$/.exec(url)
  if (match === null) {
    throw new Error('not a data: URL')
  }
  const meta = (match[1] ?? '').split(';').map((part) => part.trim())
  const payload = match[2] ?? ''
  const isBase64 = meta.slice(1).some((part) => part.toLowerCase() === 'base64')
  const mimeType = (meta[0] ?? '').toLowerCase() || 'text/plain'

  if (isBase64) {
    const compact = payload.replace(/\s+/g, '')
    if (!/^[A-Za-z0-9+/_-]*={0,2}$/.test(compact)) {
      throw new Error('invalid base64 payload')
    }
    return { mimeType, data: new Uint8Array(Buffer.from(compact, 'base64')) }
  }

  let decoded: string
  try {
    decoded = decodeURIComponent(payload)
  } catch {
    throw new Error('invalid percent-encoding')
  }
  return { mimeType, data: new TextEncoder().encode(decoded) }
}

function looksTextual(name: string, mimeType: string): boolean {
  if (mimeType.startsWith('text/') || TEXT_MIME_TYPES.has(mimeType)) return true
  const dot = name.lastIndexOf('.')
  return dot !== -1 && TEXT_EXTENSIONS.has(name.slice(dot).toLowerCase())
}

function decodeUtf8(data: Uint8Array): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data)
  } catch {
    return undefined
  }
}

/**
 * Decode every attachment. Attachments that are not data URLs or fail to
 * decode are skipped and reported, never thrown.
 */
export function decodeAttachments(refs: AttachmentRef[]): DecodeResult {
  const attachments: DecodedAttachment[] = []
  const skipped: SkippedAttachment[] = []

  for (const ref of refs) {
    try {
      const { mimeType, data } = parseDataUrl(ref.url)
      const text = looksTextual(ref.name, mimeType) ? decodeUtf8(data) : undefined
      attachments.push({ name: ref.name, mimeType, data, ...(text !== undefined && { text }) })
    } catch (err) {
      skipped.push({ name: ref.name, reason: err instanceof Error ? err.message : String(err) })
    }
  }

  return { attachments, skipped }
}
