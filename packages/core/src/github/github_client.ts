/**
 * GitHubClient - REST Git Data API and GraphQL calls for one repository
 *
 * Every call asks the token provider for a current installation token and
 * goes through requestGitHub for headers, timeout and response checks.
 *
 * @module github/client
 */

import type {
  CreateBlobRequest,
  CreateCommitOnBranchInput,
  CreateCommitRequest,
  CreateTreeRequest,
  CreatedCommit,
  GetReferenceResult,
  GitHubFetchFn,
  RepositoryRef,
} from './github.types';
import { GitHubApiError } from './github.types';
import { DEFAULT_API_BASE_URL, parseGitHubResponse, requestGitHub, sendGitHubRequest } from './request';
import {
  validateCommitResponse,
  validateGitObjectResponse,
  validateGraphQLCommitResponse,
  validateReferenceResponse,
} from './response_validators';

/** Anything that hands out a current installation token */
export interface TokenSource {
  getAccessToken(force?: boolean): Promise<{ readonly value: string }>;
}

export type GitHubClientOptions = RepositoryRef & {
  tokenSource: TokenSource;
  apiBaseUrl?: string;
  fetchFn?: GitHubFetchFn;
  timeoutMs?: number;
};

const CREATE_COMMIT_ON_BRANCH_MUTATION = `mutation ($input: CreateCommitOnBranchInput!) {
  createCommitOnBranch(input: $input) {
    commit {
      url
      oid
    }
  }
}`;

/** Percent-encodes each segment of a branch name, keeping the slashes */
export function encodeRefPath(branch: string): string {
  return branch.split('/').map(encodeURIComponent).join('/');
}

export class GitHubClient {
  private readonly owner: string;
  private readonly repo: string;
  private readonly apiBaseUrl: string;
  private readonly fetchFn: GitHubFetchFn;
  private readonly tokenSource: TokenSource;
  private readonly timeoutMs: number | undefined;

  constructor(options: GitHubClientOptions) {
    this.owner = options.owner;
    this.repo = options.repo;
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
    this.tokenSource = options.tokenSource;
    this.timeoutMs = options.timeoutMs;
  }

  get repositoryNameWithOwner(): string {
    return `${this.owner}/${this.repo}`;
  }

  // ═══════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════

  /** Build URL for repository-scoped Git Data endpoints */
  protected buildUrl(path: string): string {
    return `${this.apiBaseUrl}/repos/${this.owner}/${this.repo}/${path}`;
  }

  private async token(): Promise<string> {
    const snapshot = await this.tokenSource.getAccessToken();
    return snapshot.value;
  }

  // ═══════════════════════════════════════════════════════════════
  // GIT OBJECTS
  // ═══════════════════════════════════════════════════════════════

  /** Uploads a blob and returns its id */
  async createBlob(request: CreateBlobRequest): Promise<string> {
    const data = await requestGitHub(
      {
        fetchFn: this.fetchFn,
        url: this.buildUrl('git/blobs'),
        method: 'POST',
        token: await this.token(),
        body: request,
        expectedStatus: [201],
        context: 'creating blob',
        timeoutMs: this.timeoutMs,
      },
      validateGitObjectResponse,
    );
    return data.sha;
  }

  /** Creates a tree and returns its id */
  async createTree(request: CreateTreeRequest): Promise<string> {
    const data = await requestGitHub(
      {
        fetchFn: this.fetchFn,
        url: this.buildUrl('git/trees'),
        method: 'POST',
        token: await this.token(),
        body: request,
        expectedStatus: [201],
        context: 'creating tree',
        timeoutMs: this.timeoutMs,
      },
      validateGitObjectResponse,
    );
    return data.sha;
  }

  async createCommit(request: CreateCommitRequest): Promise<CreatedCommit> {
    const data = await requestGitHub(
      {
        fetchFn: this.fetchFn,
        url: this.buildUrl('git/commits'),
        method: 'POST',
        token: await this.token(),
        body: request,
        expectedStatus: [201],
        context: 'creating commit',
        timeoutMs: this.timeoutMs,
      },
      validateCommitResponse,
    );
    return { sha: data.sha, url: data.html_url };
  }

  // ═══════════════════════════════════════════════════════════════
  // REFERENCES
  // ═══════════════════════════════════════════════════════════════

  /**
   * Looks up `heads/<branch>`.
   *
   * @returns `{ found: false }` when the branch does not exist remotely
   */
  async getReference(branch: string): Promise<GetReferenceResult> {
    const context = `getting reference heads/${branch}`;
    const raw = await sendGitHubRequest({
      fetchFn: this.fetchFn,
      url: this.buildUrl(`git/ref/heads/${encodeRefPath(branch)}`),
      method: 'GET',
      token: await this.token(),
      expectedStatus: [200, 404],
      context,
      timeoutMs: this.timeoutMs,
    });

    if (raw.status === 404) {
      return { found: false };
    }

    const data = parseGitHubResponse(raw, validateReferenceResponse, context);
    return { found: true, ref: data.ref, sha: data.object.sha };
  }

  async createReference(branch: string, sha: string): Promise<void> {
    await requestGitHub(
      {
        fetchFn: this.fetchFn,
        url: this.buildUrl('git/refs'),
        method: 'POST',
        token: await this.token(),
        body: { ref: `refs/heads/${branch}`, sha },
        expectedStatus: [201],
        context: `creating reference refs/heads/${branch}`,
        timeoutMs: this.timeoutMs,
      },
      validateReferenceResponse,
    );
  }

  /**
   * Moves `heads/<branch>` to `sha`. Without `force` GitHub rejects
   * non-fast-forward updates.
   */
  async updateReference(branch: string, sha: string, force: boolean): Promise<void> {
    await requestGitHub(
      {
        fetchFn: this.fetchFn,
        url: this.buildUrl(`git/refs/heads/${encodeRefPath(branch)}`),
        method: 'PATCH',
        token: await this.token(),
        body: { sha, force },
        expectedStatus: [200],
        context: `updating reference heads/${branch}`,
        timeoutMs: this.timeoutMs,
      },
      validateReferenceResponse,
    );
  }

  // ═══════════════════════════════════════════════════════════════
  // GRAPHQL
  // ═══════════════════════════════════════════════════════════════

  /**
   * Creates a commit in one call; GitHub signs it as the app.
   *
   * @throws GitHubApiError REMOTE_ERRORS when the response carries errors
   */
  async createCommitOnBranch(input: CreateCommitOnBranchInput): Promise<CreatedCommit> {
    const context = 'creating commit on branch';
    const data = await requestGitHub(
      {
        fetchFn: this.fetchFn,
        url: `${this.apiBaseUrl}/graphql`,
        method: 'POST',
        token: await this.token(),
        body: { query: CREATE_COMMIT_ON_BRANCH_MUTATION, variables: { input } },
        expectedStatus: [200],
        context,
        restApi: false,
        timeoutMs: this.timeoutMs,
      },
      validateGraphQLCommitResponse,
    );

    if (data.errors && data.errors.length > 0) {
      throw new GitHubApiError(
        `GraphQL errors while ${context}: ${data.errors.map((e) => e.message).join('; ')}`,
        'REMOTE_ERRORS',
        200,
        JSON.stringify(data),
      );
    }

    const commit = data.data?.createCommitOnBranch?.commit;
    if (!commit) {
      throw new GitHubApiError(
        `No commit in response while ${context}`,
        'INVALID_RESPONSE',
        200,
        JSON.stringify(data),
      );
    }

    return { sha: commit.oid, url: commit.url };
  }
}
