/**
 * Git object hashing, used to tell whether a tree already holds a file.
 */

import { createHash } from 'node:crypto'

/** sha1 of `blob <byteLength>\0<content>`, as git computes it */
export function gitBlobSha(content: string): string {
  const body = Buffer.from(content, 'utf-8')
  return createHash('sha1')
    .update(`blob ${String(body.byteLength)}\0`)
    .update(body)
    .digest('hex')
}
