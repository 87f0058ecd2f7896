/**
 * Delimited-text parsing for CSV/TSV attachments.
 */

import type { DecodedAttachment } from '../../core/types.js'

const TABULAR_EXTENSIONS: Record<string, string> = {
  '.csv': ',',
  '.tsv': '\t',
}

const TABULAR_MIME: Record<string, string> = {
  'text/csv': ',',
  'text/tab-separated-values': '\t',
}

/** Delimiter for a tabular attachment, or undefined if it is not one */
export function tabularDelimiter(attachment: DecodedAttachment): string | undefined {
  if (attachment.text === undefined) return undefined
  const byMime = TABULAR_MIME[attachment.mimeType]
  if (byMime !== undefined) return byMime
  const dot = attachment.name.lastIndexOf('.')
  if (dot === -1) return undefined
  return TABULAR_EXTENSIONS[attachment.name.slice(dot).toLowerCase()]
}

/**
 * Parse delimited text. Double-quoted fields may contain the delimiter,
 * newlines and doubled quotes. Blank lines are dropped.
 */
export function parseDelimited(text: string, delimiter: string): string[][] {
  const rows: string[][] = []
  let row: string[] = []
  let field = ''
  let inQuotes = false

  const endRow = (): void => {
    row.push(field)
    field = ''
    if (row.length > 1 || row[0] !== '') rows.push(row)
    row = []
  }

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i)
    if (inQuotes) {
      if (ch === '"') {
        if (text.charAt(i + 1) === '"') {
          field += '"'
          i++
        } else {
          inQuotes = false
        }
      } else {
        field += ch
      }
      continue
    }
    if (ch === '"' && field === '') {
      inQuotes = true
    } else if (ch === delimiter) {
      row.push(field)
      field = ''
    } else if (ch === '\n') {
      endRow()
    } else if (ch !== '\r') {
      field += ch
    }
  }
  if (field !== '' || row.length > 0) endRow()
  return rows
}

/** Parse a numeric cell (`1,234.50`, `$12`, `-3`); undefined if not numeric */
export function parseNumericCell(cell: string): number | undefined {
  const cleaned = cell.trim().replace(/^[$€£]/, '').replace(/,/g, '')
  if (!/^-?\d+(?:\.\d+)?$/.test(cleaned)) return undefined
  return Number(cleaned)
}

/**
 * Column totals for columns whose every non-empty body cell is numeric.
 * Non-numeric columns are `undefined`.
 */
export function columnTotals(body: string[][], width: number): (number | undefined)[] {
  const totals: (number | undefined)[] = []
  for (let col = 0; col < width; col++) {
    let sum = 0
    let seen = 0
    let numeric = true
    for (const row of body) {
      const cell = (row[col] ?? '').trim()
      if (cell === '') continue
      const value = parseNumericCell(cell)
      if (value === undefined) {
        numeric = false
        break
      }
      sum += value
      seen++
    }
    totals.push(numeric && seen > 0 ? sum : undefined)
  }
  return totals
}

export function formatTotal(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2)
}
