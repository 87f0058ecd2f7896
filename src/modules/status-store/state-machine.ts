/**
 * Task lifecycle state machine.
 *
 * queued → generating → committing → publishing → notifying → completed
 * Any non-terminal state may move to `failed`. `completed` and `failed`
 * are terminal.
 */

import type { TaskState } from '../../core/types.js'

const FORWARD: Readonly<Record<TaskState, readonly TaskState[]>> = {
  queued: ['generating'],
  generating: ['committing'],
  committing: ['publishing'],
  publishing: ['notifying'],
  notifying: ['completed'],
  completed: [],
  failed: [],
}

export const TERMINAL_STATES: readonly TaskState[] = ['completed', 'failed']

export function isTerminal(state: TaskState): boolean {
  return TERMINAL_STATES.includes(state)
}

export function canTransition(from: TaskState, to: TaskState): boolean {
  if (isTerminal(from)) return false
  if (to === 'failed') return true
  return FORWARD[from].includes(to)
}
