/**
 * Signature parameters of the Authorization header
 *
 * Format:
 *   Signature keyId="...",algorithm="...",headers="...",signature="..."
 */

import { SignatureError } from '../shared/errors.js';

export const AUTHORIZATION_SCHEME = 'Signature';

export const REQUIRED_PARAMETERS = ['keyId', 'algorithm', 'headers', 'signature'] as const;

/**
 * Order in which known parameters are written
 */
const PARAMETER_ORDER = ['keyId', 'algorithm', 'headers', 'clientId', 'nonce', 'signature'] as const;

export interface SignatureParameters {
  keyId: string;
  algorithm: string;
  headers: string;
  signature: string;
  clientId?: string;
  nonce?: string;
}

const PARAM_PATTERN = /\s*(\w+)\s*=\s*"((?:[^"\\]|\\.)*)"\s*(,|$)/y;

function unescape(value: string): string {
  return value.replace(/\\(.)/g, '$1');
}

function escape(value: string): string {
  return value.replace(/["\\]/g, '\\$&');
}

/**
 * Split the Authorization header into scheme and parameter string
 */
function splitScheme(authorization: string): [string, string] {
  const index = authorization.indexOf(' ');
  return index === -1
    ? [authorization, '']
    : [authorization.slice(0, index), authorization.slice(index + 1)];
}

/**
 * Check if an Authorization header uses the Signature scheme
 */
export function isSignatureAuthorization(authorization: string): boolean {
  return authorization.slice(0, AUTHORIZATION_SCHEME.length + 1).toLowerCase() === 'signature ';
}

/**
 * Extract the key id from an Authorization header without validating it
 *
 * @example
 * extractKeyIdFromHeader('Signature keyId="key-001",algorithm="ed25519"');
 * // Returns: "key-001"
 */
export function extractKeyIdFromHeader(authorization: string): string | undefined {
  const match = authorization.match(/keyId\s*=\s*"((?:[^"\\]|\\.)*)"/);
  return match ? unescape(match[1]) : undefined;
}

/**
 * Parse the parameters of a Signature Authorization header.
 * Parameters are returned in the order they appear; for duplicate keys the last one wins.
 *
 * @throws SignatureError for another scheme or a corrupt parameter string
 *
 * @example
 * parseAuthorization('Signature keyId="key-001",algorithm="hmac-sha256"');
 * // Returns: Map { 'keyId' => 'key-001', 'algorithm' => 'hmac-sha256' }
 */
export function parseAuthorization(authorization: string): Map<string, string> {
  const [scheme, paramString] = splitScheme(authorization);

  if (scheme.toLowerCase() !== AUTHORIZATION_SCHEME.toLowerCase()) {
    throw new SignatureError(`authorization scheme should be "Signature" not "${scheme}"`);
  }

  const params = new Map<string, string>();
  if (paramString.trim() === '') {
    return params;
  }

  PARAM_PATTERN.lastIndex = 0;
  let end = false;

  while (!end) {
    const match = PARAM_PATTERN.exec(paramString);
    if (!match) {
      throw new SignatureError('corrupt "Authorization" header');
    }

    params.delete(match[1]);
    params.set(match[1], unescape(match[2]));
    end = match[3] === '';
  }

  return params;
}

/**
 * Assert that all required parameters are present
 *
 * @throws SignatureError naming the first missing parameter
 */
export function assertParameters(params: Map<string, string>): SignatureParameters {
  for (const name of REQUIRED_PARAMETERS) {
    if (!params.has(name)) {
      throw new SignatureError(`${name} not specified in Authorization header`);
    }
  }

  const get = (name: string): string => params.get(name) ?? '';
  const optional = (name: string): string | undefined => params.get(name);

  return {
    keyId: get('keyId'),
    algorithm: get('algorithm'),
    headers: get('headers'),
    signature: get('signature'),
    clientId: optional('clientId'),
    nonce: optional('nonce'),
  };
}

/**
 * Create the value of the Authorization header
 *
 * @example
 * formatAuthorization({ keyId: 'key-001', algorithm: 'ed25519', headers: 'date', signature: 'c2ln' });
 * // Returns: 'Signature keyId="key-001",algorithm="ed25519",headers="date",signature="c2ln"'
 */
export function formatAuthorization(params: SignatureParameters): string {
  const pairs = PARAMETER_ORDER
    .filter((name) => params[name] !== undefined)
    .map((name) => `${name}="${escape(params[name] ?? '')}"`);

  return `${AUTHORIZATION_SCHEME} ${pairs.join(',')}`;
}

/**
 * Create a WWW-Authenticate challenge for an algorithm
 */
export function formatChallenge(algorithm: string, headers: readonly string[]): string {
  return `${AUTHORIZATION_SCHEME} algorithm="${escape(algorithm)}",headers="${escape(headers.join(' '))}"`;
}
