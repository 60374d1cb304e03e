/**
 * Commit - orchestration from staged changes to a GitHub commit
 *
 * @module commit
 */

export { CommitOrchestrator, commitStagedChanges } from './commit_orchestrator';
export type {
  CommitRequest,
  CommitResult,
  RemoteCommitApi,
  CommitOrchestratorDependencies,
  CommitStagedChangesOptions,
  CommitOutcome,
} from './commit.types';
