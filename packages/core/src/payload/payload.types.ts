import type {
  CreateBlobRequest,
  CreateCommitOnBranchInput,
  CreateTreeRequest,
  GitHubFileMode,
  GitHubNodeType,
} from '../github/github.types';
import type { ResolvedAction } from '../commit_plan/commit_plan.types';

/** How the commit is submitted to GitHub */
export type CommitStrategy = 'tree' | 'mutation';

export const COMMIT_STRATEGIES: readonly CommitStrategy[] = ['tree', 'mutation'];

/** Where and on top of what the commit is made */
export type PayloadTarget = {
  /** `owner/repo` */
  repositoryNameWithOwner: string;
  branchName: string;
  /** Local HEAD commit; the new commit's parent */
  headCommitId: string;
  commitMessage: string;
};

export type AssembledPayload =
  | { strategy: 'tree'; request: CreateTreeRequest }
  | { strategy: 'mutation'; input: CreateCommitOnBranchInput };

/**
 * Turns resolved actions into the request body of one strategy.
 * Validation failures are raised before any network call.
 */
export interface PayloadAssembler {
  readonly strategy: CommitStrategy;
  assemble(actions: readonly ResolvedAction[], target: PayloadTarget): Promise<AssembledPayload>;
}

/** Uploads binary content ahead of a tree that references it */
export interface BlobUploader {
  createBlob(request: CreateBlobRequest): Promise<string>;
}

/** Inline content or an object id; `sha: null` removes the path */
export type TreeNodeSource =
  | { kind: 'content'; content: string }
  | { kind: 'sha'; sha: string | null };

export type TreeNode = {
  path: string;
  mode: GitHubFileMode;
  type: GitHubNodeType;
  source: TreeNodeSource;
};
