/**
 * Sign outgoing requests made with fetch
 */

import { computeDigest, type DigestAlgorithm } from '../crypto/digest.js';
import { headerLine, hasHeader, withHeader, type MessageRequest } from '../crypto/request.js';
import type { SignatureEngine } from '../crypto/signature-engine.js';
import { logger } from '../shared/logger.js';

export type FetchFunction = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface SigningRequestInit extends RequestInit {
  /** Sign this request with another key */
  keyId?: string;
}

export type SigningFetch = (input: string | URL, init?: SigningRequestInit) => Promise<Response>;

export interface SigningFetchOptions {
  engine: SignatureEngine;
  /** Key used to sign each request, unless the request names another */
  keyId: string;
  /** Required if the engine supports more than one algorithm */
  algorithm?: string;
  /** Send a client id (and nonce, if the engine has a counter) */
  clientId?: string;
  /** Add a Digest header for string and Buffer bodies */
  digest?: boolean | DigestAlgorithm;
  /** Underlying fetch (default: global fetch) */
  fetch?: FetchFunction;
}

const clientLogger = logger.child({ component: 'signing-fetch' });

function digestAlgorithm(option: boolean | DigestAlgorithm | undefined): DigestAlgorithm | null {
  if (option === undefined || option === false) {
    return null;
  }
  return option === true ? 'SHA-256' : option;
}

/**
 * Add a Digest header if the body can be hashed and there is none yet
 */
function withDigest(
  request: MessageRequest,
  body: RequestInit['body'],
  algorithm: DigestAlgorithm | null
): MessageRequest {
  if (algorithm === null || hasHeader(request, 'digest')) {
    return request;
  }

  if (typeof body === 'string' || Buffer.isBuffer(body)) {
    return withHeader(request, 'Digest', computeDigest(body, algorithm));
  }

  return request;
}

/**
 * The fragment is never sent, so it isn't part of the request target
 */
function withoutFragment(url: string): string {
  const index = url.indexOf('#');
  return index === -1 ? url : url.slice(0, index);
}

/**
 * Wrap fetch so that every request gets an HTTP Signature
 *
 * @example
 * const signedFetch = createSigningFetch({ engine, keyId: 'key-001', digest: true });
 * await signedFetch('https://api.example.com/foos', { method: 'POST', body: '{"foo":"bar"}' });
 * await signedFetch('https://api.example.com/bars', { keyId: 'key-002' });
 */
export function createSigningFetch(options: SigningFetchOptions): SigningFetch {
  const fetchImpl: FetchFunction = options.fetch ?? ((input, init) => fetch(input, init));
  const algorithm = digestAlgorithm(options.digest);

  return async (input, { keyId = options.keyId, ...init } = {}) => {
    const url = withoutFragment(input.toString());
    const method = (init.method ?? 'GET').toUpperCase();
    const headers = Object.fromEntries(new Headers(init.headers).entries());

    const request = withDigest({ method, url, headers }, init.body, algorithm);
    const signed = await options.engine.sign(request, keyId, options.algorithm, options.clientId);

    clientLogger.debug({ method, url, keyId }, 'signed request');

    const signedHeaders = Object.fromEntries(
      Object.entries(signed.headers).map(([name, value]) => [name, headerLine(value)])
    );

    return fetchImpl(input, { ...init, method, headers: signedHeaders });
  };
}
