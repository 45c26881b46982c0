/**
 * Key IDs for Ed25519 JWKs
 * RFC 7638 - JSON Web Key (JWK) Thumbprint
 * https://datatracker.ietf.org/doc/html/rfc7638
 */

import { calculateJwkThumbprint, type JWK } from 'jose';

/**
 * Generate a key ID (kid) from a JWK using RFC 7638 thumbprint.
 * Only the public members take part, so a private JWK and its public
 * counterpart get the same kid.
 *
 * @returns Key ID as base64url string
 */
export async function generateKid(
  jwk: JWK,
  digestAlgorithm: 'sha256' | 'sha384' | 'sha512' = 'sha256'
): Promise<string> {
  return calculateJwkThumbprint(jwk, digestAlgorithm);
}

/**
 * Use the `kid` of the JWK, or its thumbprint if it has none
 */
export async function resolveKid(jwk: JWK): Promise<string> {
  return jwk.kid ?? generateKid(jwk);
}

/**
 * Strip the private key material from a JWK
 */
export function toPublicJwk(jwk: JWK): JWK {
  const { d: _d, ...publicJwk } = jwk;
  return publicJwk;
}

/**
 * Validate that a JWK is an Ed25519 key usable for signing or verification
 *
 * @param jwk - JSON Web Key to validate
 * @param type - Whether the private key ('d') must be present
 */
export function validateEd25519Jwk(
  jwk: JWK,
  type: 'public' | 'private'
): {
  valid: boolean;
  error?: string;
} {
  if (jwk.kty !== 'OKP') {
    return { valid: false, error: `Unsupported key type: ${jwk.kty ?? 'none'}` };
  }

  if (jwk.crv !== 'Ed25519') {
    return { valid: false, error: 'OKP key curve must be Ed25519' };
  }

  if (!jwk.x) {
    return { valid: false, error: 'OKP key must have "x" field' };
  }

  if (type === 'private' && !jwk.d) {
    return { valid: false, error: 'Private key must have "d" field' };
  }

  if (type === 'public' && jwk.d) {
    return {
      valid: false,
      error: 'JWK contains private key material; only public keys allowed',
    };
  }

  return { valid: true };
}
