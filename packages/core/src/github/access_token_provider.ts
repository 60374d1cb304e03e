/**
 * AccessTokenProvider - GitHub App installation tokens
 *
 * Signs a short-lived app JWT and exchanges it for an installation token.
 * The token is cached as a frozen snapshot and renewed when it comes within
 * two minutes of expiring. Check-and-renew runs one caller at a time.
 *
 * @module github/access_token_provider
 */

import { createPrivateKey, sign } from 'crypto';
import type { KeyObject } from 'crypto';
import type { GitHubFetchFn } from './github.types';
import { DEFAULT_API_BASE_URL, requestGitHub } from './request';
import { validateAccessTokenResponse } from './response_validators';
import { createLogger } from '../logger';

const logger = createLogger('[AccessToken] ');

export const TOKEN_REFRESH_MARGIN_MS = 2 * 60 * 1000;
export const APP_JWT_LIFETIME_SECONDS = 10 * 60;
export const TOKEN_EXCHANGE_TIMEOUT_MS = 10_000;

/** Immutable token snapshot. A renewal produces a new one. */
export type AccessToken = Readonly<{
  value: string;
  expiresAt: Date;
}>;

export type AppCredentials = {
  appId: number;
  installationId: number;
  /** PEM-encoded RSA private key, or an already parsed key */
  privateKey: string | KeyObject;
};

export type AccessTokenProviderOptions = AppCredentials & {
  apiBaseUrl?: string;
  fetchFn?: GitHubFetchFn;
  /** Clock, injectable for tests */
  now?: () => Date;
};

function base64UrlJson(value: object): string {
  return Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
}

/**
 * Builds an RS256 JWT identifying the GitHub App.
 */
export function createAppJwt(appId: number, privateKey: KeyObject, now: Date): string {
  const issuedAt = Math.floor(now.getTime() / 1000);
  const header = base64UrlJson({ alg: 'RS256', typ: 'JWT' });
  const payload = base64UrlJson({ iat: issuedAt, exp: issuedAt + APP_JWT_LIFETIME_SECONDS, iss: appId });
  const signingInput = `${header}.${payload}`;
  const signature = sign('sha256', Buffer.from(signingInput, 'utf8'), privateKey).toString('base64url');
  return `${signingInput}.${signature}`;
}

export class AccessTokenProvider {
  private readonly appId: number;
  private readonly installationId: number;
  private readonly privateKey: KeyObject;
  private readonly apiBaseUrl: string;
  private readonly fetchFn: GitHubFetchFn;
  private readonly now: () => Date;

  private current: AccessToken | null = null;
  private lock: Promise<void> = Promise.resolve();

  constructor(options: AccessTokenProviderOptions) {
    const key = typeof options.privateKey === 'string' ? createPrivateKey(options.privateKey) : options.privateKey;
    if (key.asymmetricKeyType !== 'rsa') {
      throw new Error(`GitHub App private key must be an RSA key, got ${key.asymmetricKeyType ?? 'unknown'}`);
    }

    this.appId = options.appId;
    this.installationId = options.installationId;
    this.privateKey = key;
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Returns a token valid for at least the refresh margin.
   *
   * @param force - Always acquire a new token, e.g. after the API rejected the cached one
   */
  async getAccessToken(force: boolean = false): Promise<AccessToken> {
    return this.withLock(async () => {
      const current = this.current;
      if (!force && current && !this.isExpiring(current)) {
        return current;
      }

      const renewed = await this.acquire();
      this.current = renewed;
      return renewed;
    });
  }

  /** Current snapshot without renewing it */
  peek(): AccessToken | null {
    return this.current;
  }

  private isExpiring(token: AccessToken): boolean {
    return this.now().getTime() >= token.expiresAt.getTime() - TOKEN_REFRESH_MARGIN_MS;
  }

  private withLock<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lock.then(task);
    this.lock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async acquire(): Promise<AccessToken> {
    const jwt = createAppJwt(this.appId, this.privateKey, this.now());

    const data = await requestGitHub(
      {
        fetchFn: this.fetchFn,
        url: `${this.apiBaseUrl}/app/installations/${this.installationId}/access_tokens`,
        method: 'POST',
        token: jwt,
        expectedStatus: [201],
        context: 'acquiring access token',
        timeoutMs: TOKEN_EXCHANGE_TIMEOUT_MS,
      },
      validateAccessTokenResponse,
    );

    const token: AccessToken = Object.freeze({ value: data.token, expiresAt: new Date(data.expires_at) });
    logger.debug(`Acquired installation token for installation ${this.installationId}, expires at ${data.expires_at}`);
    return token;
  }
}
