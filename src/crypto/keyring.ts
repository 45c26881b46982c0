/**
 * In-memory keyring implementing the signer and verifier of the engine.
 *
 * Supported algorithms:
 * - hmac-sha256     HMAC with a shared secret
 * - ed25519         Ed25519 signature of the message
 * - ed25519-sha256  Ed25519 signature of the SHA-256 hash of the message
 */

import {
  createHash,
  createHmac,
  createPrivateKey,
  createPublicKey,
  sign as cryptoSign,
  timingSafeEqual,
  verify as cryptoVerify,
  type KeyObject,
} from 'node:crypto';
import type { JWK } from 'jose';
import { ConfigurationError, SignatureError } from '../shared/errors.js';
import { resolveKid, toPublicJwk, validateEd25519Jwk } from './kid.js';
import type { Signer, Verifier } from './signature-engine.js';

export const KEYRING_ALGORITHMS = ['hmac-sha256', 'ed25519', 'ed25519-sha256'] as const;

export type KeyringAlgorithm = (typeof KEYRING_ALGORITHMS)[number];

function isKeyringAlgorithm(algorithm: string): algorithm is KeyringAlgorithm {
  return KEYRING_ALGORITHMS.some((supported) => supported === algorithm);
}

function ed25519Input(message: Buffer, algorithm: 'ed25519' | 'ed25519-sha256'): Buffer {
  return algorithm === 'ed25519-sha256'
    ? createHash('sha256').update(message).digest()
    : message;
}

export class Keyring implements Signer, Verifier {
  private secrets = new Map<string, Buffer>();
  private privateKeys = new Map<string, KeyObject>();
  private publicKeys = new Map<string, KeyObject>();

  /**
   * Register a shared secret for hmac-sha256
   */
  addSecret(keyId: string, secret: string | Buffer): this {
    if (secret.length === 0) {
      throw new ConfigurationError(`Secret for key "${keyId}" is empty`);
    }

    this.secrets.set(keyId, Buffer.from(secret));
    return this;
  }

  /**
   * Register an Ed25519 private key. Its public key is registered as well.
   *
   * @returns Key ID: the `kid` of the JWK or its thumbprint
   */
  async addPrivateKey(jwk: JWK): Promise<string> {
    const validation = validateEd25519Jwk(jwk, 'private');
    if (!validation.valid) {
      throw new ConfigurationError(`Invalid JWK: ${validation.error}`);
    }

    const publicJwk = toPublicJwk(jwk);
    const kid = await resolveKid(publicJwk);

    this.privateKeys.set(kid, createPrivateKey({ key: jwk, format: 'jwk' }));
    this.publicKeys.set(kid, createPublicKey({ key: publicJwk, format: 'jwk' }));

    return kid;
  }

  /**
   * Register an Ed25519 public key
   *
   * @returns Key ID: the `kid` of the JWK or its thumbprint
   */
  async addPublicKey(jwk: JWK): Promise<string> {
    const validation = validateEd25519Jwk(jwk, 'public');
    if (!validation.valid) {
      throw new ConfigurationError(`Invalid JWK: ${validation.error}`);
    }

    const kid = await resolveKid(jwk);
    this.publicKeys.set(kid, createPublicKey({ key: jwk, format: 'jwk' }));

    return kid;
  }

  has(keyId: string): boolean {
    return this.secrets.has(keyId) || this.publicKeys.has(keyId);
  }

  sign(message: Buffer, keyId: string, algorithm: string): Buffer {
    if (!isKeyringAlgorithm(algorithm)) {
      throw new SignatureError(`Unsupported algorithm: ${algorithm}`);
    }

    if (algorithm === 'hmac-sha256') {
      const secret = this.secrets.get(keyId);
      if (!secret) {
        throw new SignatureError(`Unknown key: ${keyId}`);
      }
      return createHmac('sha256', secret).update(message).digest();
    }

    const privateKey = this.privateKeys.get(keyId);
    if (!privateKey) {
      throw new SignatureError(`Unknown key: ${keyId}`);
    }

    return cryptoSign(null, ed25519Input(message, algorithm), privateKey);
  }

  verify(message: Buffer, signature: Buffer, keyId: string, algorithm: string): boolean {
    if (!isKeyringAlgorithm(algorithm)) {
      return false;
    }

    if (algorithm === 'hmac-sha256') {
      const secret = this.secrets.get(keyId);
      if (!secret) {
        return false;
      }

      const expected = createHmac('sha256', secret).update(message).digest();
      return expected.length === signature.length && timingSafeEqual(expected, signature);
    }

    const publicKey = this.publicKeys.get(keyId);
    if (!publicKey) {
      return false;
    }

    return cryptoVerify(null, ed25519Input(message, algorithm), publicKey, signature);
  }
}
