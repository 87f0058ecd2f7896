/**
 * Deterministic fallback page.
 *
 * Renders every required element with its tag and id, tabular attachments as
 * filterable tables with numeric column totals, text attachments verbatim,
 * and the brief and checks. The page references nothing outside itself.
 * Same input, same bytes.
 */

import type { DecodedAttachment, TaskCheck } from '../../core/types.js'
import { checkSource } from './element-specs.js'
import { FALLBACK_SCRIPT, FALLBACK_STYLES } from './fallback-assets.js'
import { escapeHtml } from './html-document.js'
import { columnTotals, formatTotal, parseDelimited, tabularDelimiter } from './tabular.js'
import type { ElementSpec } from './types.js'

export interface FallbackPageInput {
  taskName: string
  round: number
  brief: string
  attachments: DecodedAttachment[]
  checks: TaskCheck[]
  elements: ElementSpec[]
}

/** Turn `total-sales` / `totalSales` into `Total sales` */
export function humanizeId(id: string): string {
  const words = id
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[-_\s]+/)
    .filter((w) => w !== '')
    .map((w) => w.toLowerCase())
  const sentence = words.join(' ')
  return sentence.charAt(0).toUpperCase() + sentence.slice(1)
}

function uniqueId(base: string, taken: Set<string>): string {
  let candidate = base
  for (let n = 2; taken.has(candidate); n++) {
    candidate = `${base}-${String(n)}`
  }
  taken.add(candidate)
  return candidate
}

// ---------------------------------------------------------------------------
// Required elements
// ---------------------------------------------------------------------------

const CONTAINER_TAGS = new Set(['div', 'section', 'article', 'nav', 'span', 'p', 'pre', 'output', 'label'])

/** Markup for one required element; unknown tags render as a `div` */
export function renderElement(spec: ElementSpec): string {
  const id = escapeHtml(spec.id)
  const label = escapeHtml(humanizeId(spec.id))
  const tag = spec.tag ?? 'div'

  if (/^h[1-6]$/.test(tag)) return `<${tag} id="${id}">${label}</${tag}>`
  if (CONTAINER_TAGS.has(tag)) {
    const attrs = tag === 'output' ? ` id="${id}" aria-live="polite"` : ` id="${id}"`
    return `<${tag}${attrs} class="element">${tag === 'output' ? '' : label}</${tag}>`
  }

  switch (tag) {
    case 'button':
      return `<button type="button" id="${id}">${label}</button>`
    case 'input':
      return `<label>${label} <input type="text" id="${id}" name="${id}"></label>`
    case 'textarea':
      return `<label>${label} <textarea id="${id}" name="${id}" rows="4"></textarea></label>`
    case 'select':
      return `<label>${label} <select id="${id}" name="${id}"><option value="">Select…</option></select></label>`
    case 'a':
      return `<a id="${id}" href="#${id}">${label}</a>`
    case 'ul':
    case 'ol':
      return `<${tag} id="${id}"><li>${label}</li></${tag}>`
    case 'table':
      return `<table id="${id}"><thead><tr><th>${label}</th></tr></thead><tbody></tbody></table>`
    case 'form':
      return (
        `<form id="${id}"><label>${label} <input type="text" name="${id}-value"></label> ` +
        `<button type="submit">Submit</button></form>`
      )
    case 'canvas':
      return `<canvas id="${id}" width="400" height="200"></canvas>`
    case 'img':
      return `<img id="${id}" alt="${label}" src="data:image/gif;base64,R0lGODlhAQABAIAAAAAAAP///yH5BAEAAAAALAAAAAABAAEAAAIBRAA7">`
    default:
      return `<div id="${id}" class="element">${label}</div>`
  }
}

// ---------------------------------------------------------------------------
// Attachments
// ---------------------------------------------------------------------------

function renderTable(attachment: DecodedAttachment, text: string, delimiter: string, tableId: string): string {
  const rows = parseDelimited(text, delimiter)
  const [header = [], ...body] = rows
  const width = Math.max(header.length, ...body.map((r) => r.length))
  const totals = columnTotals(body, width)
  const filterId = `${tableId}-filter`

  const cells = (row: string[], cell: 'th' | 'td'): string =>
    Array.from({ length: width }, (_, i) => `<${cell}>${escapeHtml(row[i] ?? '')}</${cell}>`).join('')

  const footer = totals.some((t) => t !== undefined)
    ? `<tfoot><tr>${totals
        .map((t, i) => `<td>${i === 0 && t === undefined ? 'Total' : t === undefined ? '' : formatTotal(t)}</td>`)
        .join('')}</tr></tfoot>`
    : ''

  return [
    `<section class="attachment" data-attachment="${escapeHtml(attachment.name)}">`,
    `<h2>${escapeHtml(attachment.name)}</h2>`,
    `<label for="${filterId}">Filter</label> <input type="search" id="${filterId}" data-filter-for="${tableId}">`,
    `<span data-role="row-count">${String(body.length)} row(s)</span>`,
    `<table id="${tableId}"><thead><tr>${cells(header, 'th')}</tr></thead>`,
    `<tbody>${body.map((row) => `<tr>${cells(row, 'td')}</tr>`).join('')}</tbody>${footer}</table>`,
    '</section>',
  ].join('\n')
}

function base64(data: Uint8Array): string {
  return Buffer.from(data).toString('base64')
}

function renderAttachment(attachment: DecodedAttachment, index: number, taken: Set<string>): string {
  const name = escapeHtml(attachment.name)
  const text = attachment.text
  const delimiter = tabularDelimiter(attachment)

  if (text !== undefined && delimiter !== undefined) {
    return renderTable(attachment, text, delimiter, uniqueId(`data-table-${String(index + 1)}`, taken))
  }
  if (text !== undefined) {
    return `<section class="attachment" data-attachment="${name}"><h2>${name}</h2><pre>${escapeHtml(text)}</pre></section>`
  }
  if (attachment.mimeType.startsWith('image/')) {
    const src = `data:${escapeHtml(attachment.mimeType)};base64,${base64(attachment.data)}`
    return `<section class="attachment" data-attachment="${name}"><h2>${name}</h2><img alt="${name}" src="${src}"></section>`
  }
  return (
    `<section class="attachment" data-attachment="${name}"><h2>${name}</h2>` +
    `<p>${escapeHtml(attachment.mimeType)}, ${String(attachment.data.byteLength)} bytes</p></section>`
  )
}

// ---------------------------------------------------------------------------
// Page
// ---------------------------------------------------------------------------

export function renderFallbackPage(input: FallbackPageInput): string {
  const taken = new Set(input.elements.map((e) => e.id))
  const title = escapeHtml(`${input.taskName} (round ${String(input.round)})`)

  const checks =
    input.checks.length === 0
      ? ''
      : `<h3>Checks</h3><ol>${input.checks.map((c) => `<li><code>${escapeHtml(checkSource(c))}</code></li>`).join('')}</ol>`

  const body = [
    '<main>',
    `<header><p class="task">${title}</p></header>`,
    ...input.elements.map(renderElement),
    ...input.attachments.map((a, i) => renderAttachment(a, i, taken)),
    '<details><summary>Task brief</summary>',
    `<p>${escapeHtml(input.brief).replace(/\n/g, '<br>')}</p>`,
    checks,
    '</details>',
    '<output data-role="status" aria-live="polite"></output>',
    '</main>',
  ].filter((line) => line !== '')

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="UTF-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `<title>${title}</title>`,
    `<style>${FALLBACK_STYLES}</style>`,
    '</head>',
    '<body>',
    ...body,
    `<script>${FALLBACK_SCRIPT}</script>`,
    '</body>',
    '</html>',
    '',
  ].join('\n')
}

/** Last-resort page used only if rendering itself throws */
export function renderMinimalPage(taskName: string, brief: string): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    `<head><meta charset="UTF-8"><title>${escapeHtml(taskName)}</title></head>`,
    `<body><main><h1>${escapeHtml(taskName)}</h1><p>${escapeHtml(brief)}</p></main></body>`,
    '</html>',
    '',
  ].join('\n')
}
