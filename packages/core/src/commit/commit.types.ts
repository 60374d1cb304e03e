import type { LocalRepository } from '../git/types';
import type { GitHubClient } from '../github/github_client';
import type { AppCredentials } from '../github/access_token_provider';
import type { GitHubFetchFn } from '../github/github.types';
import type { CommitStrategy } from '../payload/payload.types';
import type { Logger } from '../logger';

/** What to commit where */
export type CommitRequest = {
  commitMessage: string;
  /** Sent as-is with the ref update when the branch already exists */
  forcePush: boolean;
  repoOwner: string;
  repoName: string;
  branchName: string;
  /** Local HEAD; parent of the new commit */
  headCommitId: string;
};

export type CommitResult = {
  commitUrl: string;
  commitSha: string;
  strategy: CommitStrategy;
};

/** GitHub operations the orchestrator needs */
export type RemoteCommitApi = Pick<
  GitHubClient,
  | 'createBlob'
  | 'createTree'
  | 'createCommit'
  | 'getReference'
  | 'createReference'
  | 'updateReference'
  | 'createCommitOnBranch'
>;

export type CommitOrchestratorDependencies = {
  repository: LocalRepository;
  github: RemoteCommitApi;
  strategy?: CommitStrategy;
  logger?: Logger;
};

export type CommitStagedChangesOptions = CommitRequest &
  AppCredentials & {
    repository: LocalRepository;
    strategy?: CommitStrategy;
    apiBaseUrl?: string;
    fetchFn?: GitHubFetchFn;
    logger?: Logger;
  };

export type CommitOutcome =
  | { ok: true; commitUrl: string; commitSha: string }
  | { ok: false; error: string };
