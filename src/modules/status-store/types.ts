/**
 * Types for the status-store module.
 */

import type {
  ArtifactSource,
  DecodedAttachment,
  NotificationOutcome,
  RepositoryHandle,
  TaskCheck,
  TaskError,
  TaskState,
} from '../../core/types.js'

/** Fields supplied when a record is created on acceptance */
export interface NewTaskRecord {
  nonce: string
  taskName: string
  round: number
  email: string
  brief: string
  attachments: DecodedAttachment[]
  checks: TaskCheck[]
  evaluationUrl: string
  callerEndpoint: string
}

/** Mutable, non-state fields a stage may fill in */
export interface TaskRecordPatch {
  generatedArtifact?: string
  artifactSource?: ArtifactSource
  repositoryName?: string
  repositoryUrl?: string
  commitSha?: string
  pagesUrl?: string
  notification?: NotificationOutcome
}

export interface TaskListFilter {
  state?: TaskState
  taskName?: string
}

/** One committed round's brief, kept for the README history and merge policy */
export interface RoundBrief {
  round: number
  brief: string
  nonce: string
  committedAt: string
}

/** The repository a task name resolved to, shared by all of its rounds */
export interface RepositoryBinding {
  taskName: string
  handle: RepositoryHandle
  rounds: RoundBrief[]
  boundAt: string
}

export type TaskStateCounts = Record<TaskState, number>
