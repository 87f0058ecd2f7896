/**
 * Barrel exports for the status-store module.
 */

export type { StatusStore } from './status-store.js'
export { InMemoryStatusStore, createStatusStore, toPublicStatus } from './status-store-impl.js'
export type { StatusStoreOptions } from './status-store-impl.js'
export { canTransition, isTerminal, TERMINAL_STATES } from './state-machine.js'
export type {
  NewTaskRecord,
  TaskRecordPatch,
  TaskListFilter,
  RoundBrief,
  RepositoryBinding,
  TaskStateCounts,
} from './types.js'
