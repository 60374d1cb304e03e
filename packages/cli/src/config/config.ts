/**
 * CLI configuration: environment variables, .env file and git metadata
 *
 * @module config
 */

import * as path from 'path';
import { createPrivateKey } from 'crypto';
import type { KeyObject } from 'crypto';
import * as dotenv from 'dotenv';
import type { Git } from '@app-commit/core';

export const ENV_APP_ID = 'APP_COMMIT_GITHUB_APP_ID';
export const ENV_INSTALLATION_ID = 'APP_COMMIT_GITHUB_APP_INSTALLATION_ID';
export const ENV_PRIVATE_KEY = 'APP_COMMIT_GITHUB_APP_PRIVATE_KEY_PEM_DATA';
export const ENV_API_URL = 'APP_COMMIT_GITHUB_API_URL';

export type Environment = Record<string, string | undefined>;

/**
 * Error thrown when configuration is missing or invalid
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export type AppConfig = {
  appId: number;
  installationId: number;
  privateKey: KeyObject;
  apiBaseUrl?: string;
};

export type RemoteRepository = {
  owner: string;
  repo: string;
};

export type GitConfig = RemoteRepository & {
  branchName: string;
  headCommitId: string;
};

/**
 * Loads `.env` from the working directory. Variables already set win.
 */
export function loadDotEnv(cwd: string = process.cwd()): void {
  dotenv.config({ path: path.join(cwd, '.env'), override: false });
}

function requireVariable(env: Environment, name: string): string {
  const value = env[name];
  if (value === undefined || value === '') {
    throw new ConfigError(`Environment variable not set: ${name}`);
  }
  return value;
}

function requireUnsignedInteger(env: Environment, name: string): number {
  const raw = requireVariable(env, name);
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value)) {
    throw new ConfigError(`Environment variable ${name} cannot be parsed as an unsigned integer: ${raw}`);
  }
  return value;
}

function requireRsaPrivateKey(env: Environment, name: string): KeyObject {
  const pem = requireVariable(env, name);
  let key: KeyObject;
  try {
    key = createPrivateKey(pem);
  } catch {
    throw new ConfigError(`Environment variable ${name} is not a valid RSA private key`);
  }
  if (key.asymmetricKeyType !== 'rsa') {
    throw new ConfigError(`Environment variable ${name} is not a valid RSA private key`);
  }
  return key;
}

/**
 * Reads the GitHub App credentials from the environment.
 *
 * @throws ConfigError naming the first missing or invalid variable
 */
export function readAppConfig(env: Environment = process.env): AppConfig {
  const config: AppConfig = {
    appId: requireUnsignedInteger(env, ENV_APP_ID),
    installationId: requireUnsignedInteger(env, ENV_INSTALLATION_ID),
    privateKey: requireRsaPrivateKey(env, ENV_PRIVATE_KEY),
  };
  const apiBaseUrl = env[ENV_API_URL];
  if (apiBaseUrl) {
    config.apiBaseUrl = apiBaseUrl;
  }
  return config;
}

const SCP_REMOTE = /^git@github\.com:(.+)\/(.+)$/;
const HTTPS_REMOTE = /^https:\/\/github\.com\/(.+)\/(.+)$/;

/**
 * Extracts owner and repository name from a GitHub remote URL
 * (`git@github.com:owner/repo.git` or `https://github.com/owner/repo`).
 */
export function parseRemoteUrl(url: string): RemoteRepository {
  const match = SCP_REMOTE.exec(url) ?? HTTPS_REMOTE.exec(url);
  const owner = match?.[1];
  const rawName = match?.[2];
  const repo = rawName?.replace(/\/+$/, '').replace(/\.git$/, '');

  if (!owner || !repo) {
    throw new ConfigError(
      `Expected remote URL to match git@github.com:repo_owner/repo_name or https://github.com/repo_owner/repo_name: ${JSON.stringify(url)}`,
    );
  }
  return { owner, repo };
}

/**
 * Branch, HEAD commit and GitHub repository of the local checkout.
 * An explicit owner/repo skips the remote lookup.
 */
export async function readGitConfig(
  repository: Git.LocalRepository,
  override: Partial<RemoteRepository> = {},
): Promise<GitConfig> {
  const branchName = await repository.getCurrentBranch();
  const headCommitId = await repository.getCommitHash('HEAD');

  let remote: RemoteRepository;
  if (override.owner && override.repo) {
    remote = { owner: override.owner, repo: override.repo };
  } else {
    const url = await repository.getRemoteUrl('origin');
    if (!url) {
      throw new ConfigError(`No remote associated with branch ${JSON.stringify(branchName)}`);
    }
    remote = { ...parseRemoteUrl(url), ...definedOnly(override) };
  }

  return { branchName, headCommitId, ...remote };
}

function definedOnly(override: Partial<RemoteRepository>): Partial<RemoteRepository> {
  const result: Partial<RemoteRepository> = {};
  if (override.owner) result.owner = override.owner;
  if (override.repo) result.repo = override.repo;
  return result;
}
