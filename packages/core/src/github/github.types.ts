/**
 * Shared types for the GitHub REST and GraphQL calls made while committing.
 *
 * Wire shapes mirror the GitHub API field names.
 */

/**
 * HTTP fetch function signature for dependency injection (testability).
 * Defaults to globalThis.fetch in production.
 * In tests, inject a mock function to avoid real HTTP calls.
 */
export type GitHubFetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Error codes for GitHub API errors.
 */
export type GitHubApiErrorCode =
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'UNEXPECTED_STATUS'
  | 'INVALID_RESPONSE'
  | 'REMOTE_ERRORS';

/**
 * Typed error for GitHub API operations. Carries the raw response body
 * when one was received.
 */
export class GitHubApiError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: GitHubApiErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
    /** Raw response body (if it could be read) */
    public readonly body?: string,
  ) {
    super(message);
    this.name = 'GitHubApiError';
    Object.setPrototypeOf(this, GitHubApiError.prototype);
  }
}

/** Coordinates of the target repository */
export type RepositoryRef = {
  owner: string;
  repo: string;
};

// ==================== Git Data API ====================

export type GitHubFileMode = '100644' | '100755' | '120000' | '160000' | '040000';

export type GitHubNodeType = 'blob' | 'tree' | 'commit';

/**
 * One entry of a create-tree request. Exactly one of `content` and `sha`
 * is present; `sha: null` deletes the path.
 */
export type TreeEntryPayload =
  | { path: string; mode: GitHubFileMode; type: GitHubNodeType; content: string }
  | { path: string; mode: GitHubFileMode; type: GitHubNodeType; sha: string | null };

/** @see https://docs.github.com/en/rest/git/trees#create-a-tree */
export type CreateTreeRequest = {
  base_tree: string;
  tree: TreeEntryPayload[];
};

/** @see https://docs.github.com/en/rest/git/blobs#create-a-blob */
export type CreateBlobRequest = {
  content: string;
  encoding: 'base64' | 'utf-8';
};

/** @see https://docs.github.com/en/rest/git/commits#create-a-commit */
export type CreateCommitRequest = {
  message: string;
  tree: string;
  parents: string[];
};

/** Blob and tree creation responses; only the id is used */
export type GitObjectResponse = {
  sha: string;
};

export type CommitResponse = {
  sha: string;
  html_url: string;
};

/** @see https://docs.github.com/en/rest/git/refs#get-a-reference */
export type ReferenceResponse = {
  ref: string;
  object: { sha: string };
};

export type GetReferenceResult =
  | { found: true; ref: string; sha: string }
  | { found: false };

/** @see https://docs.github.com/en/rest/apps/apps#create-an-installation-access-token-for-an-app */
export type AccessTokenResponse = {
  token: string;
  expires_at: string;
};

// ==================== GraphQL ====================

export type FileAddition = {
  path: string;
  /** Base64-encoded file contents */
  contents: string;
};

export type FileDeletion = {
  path: string;
};

export type CommitMessage = {
  headline: string;
  body?: string;
};

/** @see https://docs.github.com/en/graphql/reference/input-objects#createcommitonbranchinput */
export type CreateCommitOnBranchInput = {
  branch: {
    repositoryNameWithOwner: string;
    branchName: string;
  };
  expectedHeadOid: string;
  fileChanges: {
    additions: FileAddition[];
    deletions: FileDeletion[];
  };
  message: CommitMessage;
};

export type GraphQLCommitResponse = {
  data?: {
    createCommitOnBranch?: {
      commit?: { url: string; oid: string } | null;
    } | null;
  } | null;
  errors?: Array<{ message: string }>;
};

/** Outcome of a created commit, whichever API created it */
export type CreatedCommit = {
  sha: string;
  url: string;
};
