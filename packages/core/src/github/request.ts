/**
 * requestGitHub - single path for every outbound GitHub call
 *
 * Applies the fixed headers and a bounded timeout, checks the status
 * code, reads the body as text first, then parses and validates it.
 *
 * @module github/request
 */

import type { ValidateFunction } from 'ajv';
import { GitHubApiError } from './github.types';
import type { GitHubFetchFn } from './github.types';
import { describeValidationErrors } from './response_validators';
import { createLogger } from '../logger';

const logger = createLogger('[GitHub] ');

export const DEFAULT_API_BASE_URL = 'https://api.github.com';
export const GITHUB_API_VERSION = '2022-11-28';
export const USER_AGENT = 'app-commit';
export const DEFAULT_TIMEOUT_MS = 60_000;

export type GitHubRequest = {
  fetchFn: GitHubFetchFn;
  url: string;
  method: 'GET' | 'POST' | 'PATCH';
  /** Bearer credential: an installation token or an app JWT */
  token: string;
  body?: unknown;
  /** Status codes treated as success */
  expectedStatus: readonly number[];
  /** What the call does, used in error messages (e.g. "creating tree") */
  context: string;
  timeoutMs?: number;
  /** Sends X-GitHub-Api-Version; GraphQL calls leave it off */
  restApi?: boolean;
};

export type GitHubRawResponse = {
  status: number;
  text: string;
};

function buildHeaders(request: GitHubRequest): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    Authorization: `Bearer ${request.token}`,
    'User-Agent': USER_AGENT,
  };
  if (request.restApi !== false) {
    headers['X-GitHub-Api-Version'] = GITHUB_API_VERSION;
  }
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }
  return headers;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Strict UTF-8 decode of the body; null when the bytes are not text.
 */
async function readBodyText(response: Response): Promise<string | null> {
  const bytes = await response.arrayBuffer();
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Sends the request and returns the status with the body as text.
 *
 * @throws GitHubApiError NETWORK_ERROR, TIMEOUT or UNEXPECTED_STATUS
 */
export async function sendGitHubRequest(request: GitHubRequest): Promise<GitHubRawResponse> {
  const timeoutMs = request.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const init: RequestInit = {
    method: request.method,
    headers: buildHeaders(request),
    signal: AbortSignal.timeout(timeoutMs),
  };
  if (request.body !== undefined) {
    init.body = JSON.stringify(request.body);
  }

  logger.debug(`${request.method} ${request.url}`);

  let response: Response;
  let text: string | null;
  try {
    response = await request.fetchFn(request.url, init);
    text = await readBodyText(response);
  } catch (error: unknown) {
    if (isTimeout(error)) {
      throw new GitHubApiError(`Timed out after ${timeoutMs}ms while ${request.context}`, 'TIMEOUT');
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new GitHubApiError(`Network error while ${request.context}: ${message}`, 'NETWORK_ERROR');
  }

  if (!request.expectedStatus.includes(response.status)) {
    const detail = text === null ? '; body could not be decoded as text' : `: ${text}`;
    throw new GitHubApiError(
      `Unexpected status code ${response.status} while ${request.context}${detail}`,
      'UNEXPECTED_STATUS',
      response.status,
      text ?? undefined,
    );
  }

  if (text === null) {
    throw new GitHubApiError(
      `Response body could not be decoded as text while ${request.context}`,
      'INVALID_RESPONSE',
      response.status,
    );
  }

  return { status: response.status, text };
}

/**
 * Parses a response body and checks it against its schema.
 *
 * @throws GitHubApiError INVALID_RESPONSE with the raw body attached
 */
export function parseGitHubResponse<T>(
  raw: GitHubRawResponse,
  validate: ValidateFunction<T>,
  context: string,
): T {
  let data: unknown;
  try {
    data = JSON.parse(raw.text);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new GitHubApiError(
      `Invalid JSON in response while ${context}: ${message}: ${raw.text}`,
      'INVALID_RESPONSE',
      raw.status,
      raw.text,
    );
  }

  if (!validate(data)) {
    throw new GitHubApiError(
      `Unexpected response shape while ${context} (${describeValidationErrors(validate)}): ${raw.text}`,
      'INVALID_RESPONSE',
      raw.status,
      raw.text,
    );
  }

  return data;
}

/**
 * Sends a request and returns its validated JSON body.
 */
export async function requestGitHub<T>(request: GitHubRequest, validate: ValidateFunction<T>): Promise<T> {
  const raw = await sendGitHubRequest(request);
  return parseGitHubResponse(raw, validate, request.context);
}
