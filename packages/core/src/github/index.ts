/**
 * GitHub API access for creating commits
 *
 * @module github
 */

export { GitHubClient } from './github_client';
export type { GitHubClientOptions, TokenSource } from './github_client';
export {
  AccessTokenProvider,
  createAppJwt,
  TOKEN_REFRESH_MARGIN_MS,
  APP_JWT_LIFETIME_SECONDS,
  TOKEN_EXCHANGE_TIMEOUT_MS,
} from './access_token_provider';
export type { AccessToken, AppCredentials, AccessTokenProviderOptions } from './access_token_provider';
export {
  requestGitHub,
  sendGitHubRequest,
  parseGitHubResponse,
  DEFAULT_API_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  GITHUB_API_VERSION,
  USER_AGENT,
} from './request';
export type { GitHubRequest, GitHubRawResponse } from './request';
export { GitHubApiError } from './github.types';
export type {
  GitHubFetchFn,
  GitHubApiErrorCode,
  RepositoryRef,
  GitHubFileMode,
  GitHubNodeType,
  TreeEntryPayload,
  CreateTreeRequest,
  CreateBlobRequest,
  CreateCommitRequest,
  GetReferenceResult,
  AccessTokenResponse,
  FileAddition,
  FileDeletion,
  CommitMessage,
  CreateCommitOnBranchInput,
  CreatedCommit,
} from './github.types';
