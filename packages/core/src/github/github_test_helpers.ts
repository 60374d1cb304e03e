/**
 * Test helpers for code that talks to GitHub through an injected fetchFn.
 */

import { generateKeyPairSync } from 'crypto';
import type { KeyObject } from 'crypto';
import type { GitHubFetchFn } from './github.types';

export type RecordedRequest = {
  url: string;
  method: string;
  /** Header names lowercased */
  headers: Record<string, string>;
  /** Parsed JSON request body, if any */
  body: unknown;
};

export type StubReply =
  | { status: number; json?: unknown; text?: string; bytes?: Uint8Array }
  | Error;

export type FetchStub = {
  fetchFn: jest.MockedFunction<GitHubFetchFn>;
  requests: RecordedRequest[];
};

function record(url: string, init?: RequestInit): RecordedRequest {
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, name) => {
    headers[name] = value;
  });
  return {
    url,
    method: init?.method ?? 'GET',
    headers,
    body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
  };
}

function toResponse(reply: Exclude<StubReply, Error>): Response {
  const body = reply.bytes ?? reply.text ?? (reply.json === undefined ? '' : JSON.stringify(reply.json));
  return new Response(body, { status: reply.status });
}

/**
 * Fetch stub answering from a queue of replies, or from a handler that
 * picks the reply per request. An Error reply rejects the fetch.
 */
export function createFetchStub(replies: StubReply[] | ((request: RecordedRequest) => StubReply)): FetchStub {
  const requests: RecordedRequest[] = [];
  const queue = Array.isArray(replies) ? [...replies] : null;

  const fetchFn: jest.MockedFunction<GitHubFetchFn> = jest.fn(async (url: string, init?: RequestInit) => {
    const request = record(url, init);
    requests.push(request);

    const reply = queue ? queue.shift() : typeof replies === 'function' ? replies(request) : undefined;
    if (reply === undefined) {
      throw new Error(`unexpected request: ${request.method} ${url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return toResponse(reply);
  });

  return { fetchFn, requests };
}

/** Fresh RSA key pair for signing app JWTs in tests */
export function generateTestKeyPair(): { privateKey: KeyObject; publicKey: KeyObject; privateKeyPem: string } {
  const { privateKey, publicKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
  const privateKeyPem = privateKey.export({ type: 'pkcs8', format: 'pem' }).toString();
  return { privateKey, publicKey, privateKeyPem };
}

/** Decodes the header and payload of a JWT without verifying it */
export function decodeJwt(jwt: string): { header: unknown; payload: unknown; signingInput: string; signature: Buffer } {
  const [header = '', payload = '', signature = ''] = jwt.split('.');
  return {
    header: JSON.parse(Buffer.from(header, 'base64url').toString('utf8')),
    payload: JSON.parse(Buffer.from(payload, 'base64url').toString('utf8')),
    signingInput: `${header}.${payload}`,
    signature: Buffer.from(signature, 'base64url'),
  };
}
