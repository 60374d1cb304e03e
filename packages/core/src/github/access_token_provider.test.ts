import { generateKeyPairSync, verify } from 'crypto';
import type { KeyObject } from 'crypto';
import { AccessTokenProvider, createAppJwt } from './access_token_provider';
import { createFetchStub, decodeJwt, generateTestKeyPair } from './github_test_helpers';
import type { StubReply } from './github_test_helpers';

const NOW = new Date('2026-01-01T12:00:00Z');

function tokenReply(token: string, expiresAt: string): StubReply {
  return { status: 201, json: { token, expires_at: expiresAt, permissions: { contents: 'write' } } };
}

describe('createAppJwt', () => {
  let keys: { privateKey: KeyObject; publicKey: KeyObject };

  beforeAll(() => {
    keys = generateTestKeyPair();
  });

  it('should sign an RS256 JWT issued by the app for ten minutes', () => {
    const jwt = createAppJwt(12345, keys.privateKey, NOW);
    const decoded = decodeJwt(jwt);

    expect(decoded.header).toEqual({ alg: 'RS256', typ: 'JWT' });
    expect(decoded.payload).toEqual({ iat: 1767268800, exp: 1767269400, iss: 12345 });
    expect(verify('sha256', Buffer.from(decoded.signingInput), keys.publicKey, decoded.signature)).toBe(true);
  });
});

describe('AccessTokenProvider', () => {
  let privateKeyPem: string;
  let publicKey: KeyObject;
  let clock: Date;

  beforeAll(() => {
    ({ privateKeyPem, publicKey } = generateTestKeyPair());
  });

  beforeEach(() => {
    clock = NOW;
  });

  function createProvider(replies: StubReply[]) {
    const stub = createFetchStub(replies);
    const provider = new AccessTokenProvider({
      appId: 12345,
      installationId: 678,
      privateKey: privateKeyPem,
      apiBaseUrl: 'https://api.github.test',
      fetchFn: stub.fetchFn,
      now: () => clock,
    });
    return { provider, stub };
  }

  it('should exchange a signed JWT for an installation token', async () => {
    const { provider, stub } = createProvider([tokenReply('test-token-1', '2026-01-01T13:00:00Z')]);

    const token = await provider.getAccessToken();

    expect(token.value).toBe('test-token-1');
    expect(token.expiresAt.toISOString()).toBe('2026-01-01T13:00:00.000Z');

    const sent = stub.requests[0];
    expect(sent?.url).toBe('https://api.github.test/app/installations/678/access_tokens');
    expect(sent?.method).toBe('POST');
    expect(sent?.headers['x-github-api-version']).toBe('2022-11-28');

    const jwt = (sent?.headers['authorization'] ?? '').replace(/^Bearer /, '');
    const decoded = decodeJwt(jwt);
    expect(decoded.payload).toMatchObject({ iss: 12345 });
    expect(verify('sha256', Buffer.from(decoded.signingInput), publicKey, decoded.signature)).toBe(true);
  });

  it('should reuse the cached token while it is outside the safety margin', async () => {
    const { provider, stub } = createProvider([tokenReply('test-token-1', '2026-01-01T13:00:00Z')]);

    const first = await provider.getAccessToken();
    clock = new Date('2026-01-01T12:57:59Z');
    const second = await provider.getAccessToken();

    expect(second).toBe(first);
    expect(stub.fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should renew within two minutes of expiry', async () => {
    const { provider } = createProvider([
      tokenReply('test-token-1', '2026-01-01T13:00:00Z'),
      tokenReply('test-token-2', '2026-01-01T14:00:00Z'),
    ]);

    await provider.getAccessToken();
    clock = new Date('2026-01-01T12:58:00Z');

    await expect(provider.getAccessToken()).resolves.toMatchObject({ value: 'test-token-2' });
  });

  it('should always renew when forced', async () => {
    const { provider, stub } = createProvider([
      tokenReply('test-token-1', '2026-01-01T13:00:00Z'),
      tokenReply('test-token-2', '2026-01-01T13:00:00Z'),
    ]);

    const first = await provider.getAccessToken();
    const forced = await provider.getAccessToken(true);

    expect(forced.value).toBe('test-token-2');
    expect(forced).not.toBe(first);
    expect(first.value).toBe('test-token-1');
    expect(stub.fetchFn).toHaveBeenCalledTimes(2);
  });

  it('should hand out frozen snapshots', async () => {
    const { provider } = createProvider([tokenReply('test-token-1', '2026-01-01T13:00:00Z')]);

    expect(Object.isFrozen(await provider.getAccessToken())).toBe(true);
  });

  it('should share one exchange between concurrent callers', async () => {
    const { provider, stub } = createProvider([tokenReply('test-token-1', '2026-01-01T13:00:00Z')]);

    const tokens = await Promise.all([provider.getAccessToken(), provider.getAccessToken(), provider.getAccessToken()]);

    expect(stub.fetchFn).toHaveBeenCalledTimes(1);
    expect(new Set(tokens).size).toBe(1);
  });

  it('should peek without renewing', async () => {
    const { provider, stub } = createProvider([tokenReply('test-token-1', '2026-01-01T13:00:00Z')]);

    expect(provider.peek()).toBeNull();
    const token = await provider.getAccessToken();
    clock = new Date('2026-01-01T14:00:00Z');

    expect(provider.peek()).toBe(token);
    expect(stub.fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should report a failed exchange with status and body', async () => {
    const { provider } = createProvider([{ status: 401, text: '{"message":"A JSON web token could not be decoded"}' }]);

    await expect(provider.getAccessToken()).rejects.toThrow(
      'Unexpected status code 401 while acquiring access token: {"message":"A JSON web token could not be decoded"}',
    );
  });

  it('should keep working after a failed exchange', async () => {
    const { provider } = createProvider([
      new TypeError('fetch failed'),
      tokenReply('test-token-2', '2026-01-01T13:00:00Z'),
    ]);

    await expect(provider.getAccessToken()).rejects.toMatchObject({ code: 'NETWORK_ERROR' });
    await expect(provider.getAccessToken()).resolves.toMatchObject({ value: 'test-token-2' });
  });

  it('should reject an expiry that is not a date-time', async () => {
    const { provider } = createProvider([{ status: 201, json: { token: 'test-token-1', expires_at: 'soon' } }]);

    await expect(provider.getAccessToken()).rejects.toMatchObject({ code: 'INVALID_RESPONSE' });
  });

  it('should refuse a non-RSA key', () => {
    const { privateKey } = generateKeyPairSync('ec', { namedCurve: 'P-256' });

    expect(() => new AccessTokenProvider({ appId: 1, installationId: 2, privateKey })).toThrow(
      'GitHub App private key must be an RSA key, got ec',
    );
  });
});
