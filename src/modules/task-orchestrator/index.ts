/**
 * Task orchestrator module: public API exports.
 */

export type { TaskOrchestrator } from './task-orchestrator.js'
export { createTaskOrchestrator } from './task-orchestrator-impl.js'
export type { TaskOrchestratorConfig, TaskOrchestratorDeps } from './types.js'
export { parseSubmission, verifySubmissionSecret, SubmissionSchema } from './submission.js'
export type { SubmissionInput } from './submission.js'
