/**
 * Files committed alongside the generated page.
 */

import type { ArtifactSource, RepositoryHandle } from '../../core/types.js'
import type { TreeFile } from './hosting-client.js'

export interface RoundSummary {
  round: number
  brief: string
}

export interface ProjectFilesInput {
  taskName: string
  round: number
  brief: string
  html: string
  artifactSource: ArtifactSource
  repository: RepositoryHandle
  /** Expected public URL of the site */
  pagesUrl: string
  /** Briefs of earlier committed rounds, oldest first */
  history: RoundSummary[]
  licenseHolder: string
  year: number
}

/** Conventional static-hosting URL for a repository */
export function defaultPagesUrl(handle: RepositoryHandle): string {
  return `https://${handle.owner.toLowerCase()}.github.io/${handle.name}/`
}

export function updatesFileName(round: number): string {
  return `round-${String(round)}-updates.md`
}

function quote(text: string): string {
  return text
    .trim()
    .split('\n')
    .map((line) => (line === '' ? '>' : `> ${line}`))
    .join('\n')
}

export function renderReadme(input: ProjectFilesInput): string {
  const rounds = [...input.history.filter((h) => h.round !== input.round), { round: input.round, brief: input.brief }]
    .sort((a, b) => a.round - b.round)
    .map((r) => `- **Round ${String(r.round)}**: ${r.brief.trim().split('\n')[0] ?? ''}`)

  return [
    `# ${input.taskName}`,
    '',
    quote(input.brief),
    '',
    '## Live site',
    '',
    input.pagesUrl,
    '',
    '## Rounds',
    '',
    ...rounds,
    '',
    '## Files',
    '',
    '- `index.html`: the complete single-page application (HTML, CSS and JavaScript in one file)',
    ...(input.round >= 2 ? [`- \`${updatesFileName(input.round)}\`: what changed in round ${String(input.round)}`] : []),
    '',
    '## Repository',
    '',
    input.repository.htmlUrl,
    '',
    '## License',
    '',
    'MIT. See [LICENSE](LICENSE).',
    '',
  ].join('\n')
}

export function renderLicense(holder: string, year: number): string {
  return `MIT License

Copyright (c) ${String(year)} ${holder}

Permission is hereby granted, free of charge, to any person obtaining a copy
of this software and associated documentation files (the "Software"), to deal
in the Software without restriction, including without limitation the rights
to use, copy, modify, merge, publish, distribute, sublicense, and/or sell
copies of the Software, and to permit persons to whom the Software is
furnished to do so, subject to the following conditions:

The above copyright notice and this permission notice shall be included in all
copies or substantial portions of the Software.

THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,
FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE
AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER
LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM,
OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE
SOFTWARE.
`
}

export function renderRoundUpdates(input: ProjectFilesInput): string {
  const earlier = input.history.filter((h) => h.round < input.round)
  return [
    `# Round ${String(input.round)} updates`,
    '',
    '## Brief',
    '',
    quote(input.brief),
    '',
    '## Earlier rounds',
    '',
    ...(earlier.length === 0 ? ['None recorded.'] : earlier.map((h) => `- Round ${String(h.round)}: ${h.brief.trim().split('\n')[0] ?? ''}`)),
    '',
    '## Generation',
    '',
    input.artifactSource === 'provider'
      ? '`index.html` was regenerated by the generative provider.'
      : '`index.html` was regenerated by the deterministic fallback generator.',
    '',
  ].join('\n')
}

/**
 * Every file of one round's commit, in a stable order.
 */
export function buildProjectFiles(input: ProjectFilesInput): TreeFile[] {
  const files: TreeFile[] = [
    { path: 'index.html', content: input.html },
    { path: 'README.md', content: renderReadme(input) },
    { path: 'LICENSE', content: renderLicense(input.licenseHolder, input.year) },
  ]
  if (input.round >= 2) {
    files.push({ path: updatesFileName(input.round), content: renderRoundUpdates(input) })
  }
  return files
}
