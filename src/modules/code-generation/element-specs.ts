/**
 * Extraction of required element ids from a brief and its checks.
 *
 * Recognised references:
 *   `tag#id` / `#id`                in prose and in check source
 *   getElementById('id')            in check source
 *   querySelector('tag#id')         in check source
 */

import type { TaskCheck } from '../../core/types.js'
import type { ElementSpec } from './types.js'

const HASH_REF = /(?:^|[^\w#&/.-])([a-zA-Z][a-zA-Z0-9]*)?#([A-Za-z][\w-]*)/g
const GET_BY_ID = /getElementById\(\s*['"`]([^'"`]+)['"`]\s*\)/g
const QUERY_SELECTOR = /querySelector(?:All)?\(\s*['"`]([a-zA-Z][a-zA-Z0-9]*)?#([A-Za-z][\w-]*)/g
const HEX_COLOUR = /^(?:[0-9a-f]{3}|[0-9a-f]{6})$/i

/** The source text of a check: its `js` field when present */
export function checkSource(check: TaskCheck): string {
  if (typeof check === 'string') return check
  const js = check['js']
  if (typeof js === 'string') return js
  return JSON.stringify(check)
}

function collect(text: string, pattern: RegExp, tagGroup: number | undefined, idGroup: number, out: ElementSpec[]): void {
  pattern.lastIndex = 0
  for (const match of text.matchAll(pattern)) {
    const id = match[idGroup]
    if (id === undefined) continue
    const tag = tagGroup === undefined ? undefined : match[tagGroup]?.toLowerCase()
    // `#fff` in prose is a colour, not an element
    if (tag === undefined && HEX_COLOUR.test(id)) continue
    out.push(tag === undefined ? { id } : { id, tag })
  }
}

/**
 * Required elements in first-mention order, one per id. A later reference
 * that names a tag fills in a tag the first one left out.
 */
export function extractElementSpecs(brief: string, checks: TaskCheck[]): ElementSpec[] {
  const found: ElementSpec[] = []
  collect(brief, HASH_REF, 1, 2, found)
  for (const check of checks) {
    const source = checkSource(check)
    collect(source, GET_BY_ID, undefined, 1, found)
    collect(source, QUERY_SELECTOR, 1, 2, found)
    collect(source, HASH_REF, 1, 2, found)
  }

  const byId = new Map<string, ElementSpec>()
  for (const spec of found) {
    const existing = byId.get(spec.id)
    if (existing === undefined) {
      byId.set(spec.id, { ...spec })
    } else if (existing.tag === undefined && spec.tag !== undefined) {
      existing.tag = spec.tag
    }
  }
  return [...byId.values()]
}
