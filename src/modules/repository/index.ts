/**
 * Barrel exports for the repository module.
 */

export type { RepositoryManager, EnsureRepositoryResult, CommitResult, RepositoryResolution } from './repository-manager.js'
export { RepositoryManagerImpl, createRepositoryManager } from './repository-manager-impl.js'
export type { RepositoryManagerConfig, RepositoryManagerDeps } from './repository-manager-impl.js'
export { HostingError, isHostingError } from './hosting-client.js'
export type {
  HostingClient,
  HostingErrorCode,
  BranchHead,
  TreeFile,
  CreateRepositoryOptions,
  CreateCommitInput,
  PagesSource,
  EnablePagesResult,
  RequestOptions,
} from './hosting-client.js'
export { GitHubHostingClient, mapOctokitError } from './github-hosting-client.js'
export type { GitHubHostingClientOptions } from './github-hosting-client.js'
export { repositoryName, candidateName, MAX_REPOSITORY_NAME_LENGTH } from './repository-name.js'
export { gitBlobSha } from './git-blob.js'
export { buildProjectFiles, defaultPagesUrl, updatesFileName, renderReadme, renderLicense } from './project-files.js'
export type { ProjectFilesInput, RoundSummary } from './project-files.js'
