/**
 * RFC 3230 Digest helpers
 * https://datatracker.ietf.org/doc/html/rfc3230
 *
 * A `Digest` header lets a signature cover the request body: sign the
 * `digest` header and check the body against it on the receiving side.
 */

import { createHash, timingSafeEqual } from 'node:crypto';

export type DigestAlgorithm = 'SHA-256' | 'SHA-512';

const HASH_ALGORITHMS: Record<DigestAlgorithm, string> = {
  'SHA-256': 'sha256',
  'SHA-512': 'sha512',
};

function isDigestAlgorithm(algorithm: string): algorithm is DigestAlgorithm {
  return Object.prototype.hasOwnProperty.call(HASH_ALGORITHMS, algorithm);
}

/**
 * Compute the digest of content
 * Format: SHA-256=BASE64
 *
 * @example
 * const digest = computeDigest(JSON.stringify({ foo: 'bar' }));
 * // Returns: "SHA-256=eji/gfOD9pQzrW6QDTWz4jhVk/dqe3q11DVbi6Qe4ks="
 */
export function computeDigest(
  content: string | Buffer,
  algorithm: DigestAlgorithm = 'SHA-256'
): string {
  const hash = createHash(HASH_ALGORITHMS[algorithm]);
  hash.update(content);

  return `${algorithm}=${hash.digest('base64')}`;
}

/**
 * Parse a Digest header value.
 * The algorithm name is upper-cased; RFC 3230 names are case-insensitive.
 *
 * @example
 * parseDigest('SHA-256=X48E9qOokqqrvdts8nOJRJN3OWDUoyWxBf7kbu9DBPE=');
 * // Returns: { algorithm: 'SHA-256', value: 'X48E9qOokqqrvdts8nOJRJN3OWDUoyWxBf7kbu9DBPE=' }
 */
export function parseDigest(headerValue: string): {
  algorithm: string;
  value: string;
} | null {
  const match = headerValue.trim().match(/^([A-Za-z0-9-]+)=([A-Za-z0-9+/]+={0,2})$/);

  if (!match) {
    return null;
  }

  return {
    algorithm: match[1].toUpperCase(),
    value: match[2],
  };
}

/**
 * Verify that content matches the Digest header
 *
 * @returns false for a different body, a malformed header or an unsupported algorithm
 */
export function verifyDigest(content: string | Buffer, digestHeader: string): boolean {
  const parsed = parseDigest(digestHeader);

  if (!parsed || !isDigestAlgorithm(parsed.algorithm)) {
    return false;
  }

  const expected = Buffer.from(computeDigest(content, parsed.algorithm));
  const actual = Buffer.from(`${parsed.algorithm}=${parsed.value}`);

  return expected.length === actual.length && timingSafeEqual(expected, actual);
}
