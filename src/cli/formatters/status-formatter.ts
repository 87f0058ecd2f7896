/**
 * Human-readable formatters for the `pagesmith run` and `pagesmith health`
 * commands.
 */

import type { HealthReport } from '../../core/engine.js'
import type { TaskError, TaskState, TaskStatusView } from '../../core/types.js'

// ---------------------------------------------------------------------------
// renderTaskStatusHuman
// ---------------------------------------------------------------------------

function describeError(error: TaskError): string {
  return `[${error.kind}] ${error.message}`
}

/**
 * Render a task status as a text report.
 *
 * Output sections:
 *  - Header: Task <name>  Round: <n>  Nonce: <nonce>  State: <state>
 *  - Repository, commit, pages URL and artifact source (when known)
 *  - Warnings, then the error of a failed task
 *  - Callback delivery outcome
 */
export function renderTaskStatusHuman(status: TaskStatusView): string {
  const lines: string[] = []

  lines.push(`Task ${status.task}  Round: ${String(status.round)}  Nonce: ${status.nonce}  State: ${status.state}`)

  const facts: Array<[string, string | undefined]> = [
    ['Repository', status.repositoryUrl],
    ['Commit', status.commitSha],
    ['Pages', status.pagesUrl],
    ['Artifact', status.artifactSource],
  ]
  const known = facts.filter((f): f is [string, string] => f[1] !== undefined)
  if (known.length > 0) {
    const width = Math.max(...known.map(([label]) => label.length)) + 1
    lines.push('')
    for (const [label, value] of known) {
      lines.push(`${`${label}:`.padEnd(width)} ${value}`)
    }
  }

  if (status.warnings.length > 0) {
    lines.push('')
    lines.push('Warnings:')
    for (const warning of status.warnings) {
      lines.push(`  ! ${describeError(warning)}`)
    }
  }

  if (status.error !== undefined) {
    lines.push('')
    lines.push(`Error: ${describeError(status.error)}`)
  }

  const notification = status.notification
  if (notification !== undefined) {
    lines.push('')
    const http = notification.statusCode !== undefined ? `HTTP ${String(notification.statusCode)}, ` : ''
    lines.push(
      `Callback: ${notification.delivered ? 'delivered' : 'not delivered'} (${http}${String(notification.attempts)} attempt(s))`
    )
  }

  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// renderHealthHuman
// ---------------------------------------------------------------------------

const STATE_COLUMNS: Array<[TaskState, string]> = [
  ['queued', 'Queued'],
  ['generating', 'Generating'],
  ['committing', 'Committing'],
  ['publishing', 'Publishing'],
  ['notifying', 'Notifying'],
  ['completed', 'Completed'],
  ['failed', 'Failed'],
]

/**
 * Render a health report with a task-count table.
 */
export function renderHealthHuman(report: HealthReport): string {
  const lines: string[] = []
  const configured = (value: boolean): string => (value ? 'configured' : 'not configured')

  lines.push(`Engine status: ${report.status}  Ready: ${report.ready ? 'yes' : 'no'}`)
  lines.push(`Generator: ${configured(report.generatorConfigured)}  Hosting: ${configured(report.hostingConfigured)}`)
  lines.push(`Active tasks: ${String(report.activeTasks)}`)
  lines.push('')

  const headers = STATE_COLUMNS.map(([, header]) => header)
  const values = STATE_COLUMNS.map(([state]) => String(report.tasks[state]))
  const widths = headers.map((h, i) => Math.max(h.length, (values[i] ?? '').length))

  lines.push(headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ').trimEnd())
  lines.push(widths.map((w) => '-'.repeat(w)).join('  '))
  lines.push(values.map((v, i) => v.padEnd(widths[i] ?? 0)).join('  ').trimEnd())

  return lines.join('\n')
}
