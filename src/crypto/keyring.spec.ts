import { createHmac } from 'node:crypto';
import { generateKeyPair, exportJWK } from 'jose';
import { Keyring, KEYRING_ALGORITHMS } from './keyring.js';
import { generateKid } from './kid.js';
import { ConfigurationError, SignatureError } from '../shared/errors.js';

const message = Buffer.from('(request-target): get /foos\ndate: Sat, 22 Aug 1981 20:52:00 +0000', 'utf-8');

async function ed25519Jwks() {
  const { publicKey, privateKey } = await generateKeyPair('EdDSA', { crv: 'Ed25519', extractable: true });

  return { publicJwk: await exportJWK(publicKey), privateJwk: await exportJWK(privateKey) };
}

describe('Keyring', () => {
  it('should list the supported algorithms', () => {
    expect(KEYRING_ALGORITHMS).toEqual(['hmac-sha256', 'ed25519', 'ed25519-sha256']);
  });

  describe('hmac-sha256', () => {
    const keyring = new Keyring().addSecret('shared-key', 'test-secret');

    it('should sign with the shared secret', () => {
      const expected = createHmac('sha256', 'test-secret').update(message).digest();

      expect(keyring.sign(message, 'shared-key', 'hmac-sha256')).toEqual(expected);
    });

    it('should verify its own signature', () => {
      const signature = keyring.sign(message, 'shared-key', 'hmac-sha256');

      expect(keyring.verify(message, signature, 'shared-key', 'hmac-sha256')).toBe(true);
    });

    it('should reject a signature of another message', () => {
      const signature = keyring.sign(message, 'shared-key', 'hmac-sha256');

      expect(keyring.verify(Buffer.from('other'), signature, 'shared-key', 'hmac-sha256')).toBe(false);
    });

    it('should reject a truncated signature', () => {
      const signature = keyring.sign(message, 'shared-key', 'hmac-sha256');

      expect(keyring.verify(message, signature.subarray(0, 16), 'shared-key', 'hmac-sha256')).toBe(false);
    });

    it('should reject an empty secret', () => {
      expect(() => new Keyring().addSecret('empty', '')).toThrow(ConfigurationError);
    });
  });

  describe('ed25519', () => {
    it.each(['ed25519', 'ed25519-sha256'])('should sign and verify with %s', async (algorithm) => {
      const { privateJwk } = await ed25519Jwks();
      const keyring = new Keyring();
      const kid = await keyring.addPrivateKey({ ...privateJwk, kid: 'key-001' });

      const signature = keyring.sign(message, kid, algorithm);

      expect(kid).toBe('key-001');
      expect(signature).toHaveLength(64);
      expect(keyring.verify(message, signature, kid, algorithm)).toBe(true);
    });

    it('should not verify an ed25519 signature as ed25519-sha256', async () => {
      const { privateJwk } = await ed25519Jwks();
      const keyring = new Keyring();
      const kid = await keyring.addPrivateKey(privateJwk);

      const signature = keyring.sign(message, kid, 'ed25519');

      expect(keyring.verify(message, signature, kid, 'ed25519-sha256')).toBe(false);
    });

    it('should verify with only the public key', async () => {
      const { publicJwk, privateJwk } = await ed25519Jwks();
      const signer = new Keyring();
      const verifier = new Keyring();

      const signerKid = await signer.addPrivateKey(privateJwk);
      const verifierKid = await verifier.addPublicKey(publicJwk);
      const signature = signer.sign(message, signerKid, 'ed25519');

      expect(verifierKid).toBe(signerKid);
      expect(verifierKid).toBe(await generateKid(publicJwk));
      expect(verifier.has(verifierKid)).toBe(true);
      expect(verifier.verify(message, signature, verifierKid, 'ed25519')).toBe(true);
      expect(() => verifier.sign(message, verifierKid, 'ed25519')).toThrow(`Unknown key: ${verifierKid}`);
    });

    it('should reject an invalid JWK', async () => {
      const { publicJwk } = await ed25519Jwks();

      await expect(new Keyring().addPrivateKey(publicJwk)).rejects.toThrow(
        'Invalid JWK: Private key must have "d" field'
      );
    });
  });

  describe('unknown keys and algorithms', () => {
    const keyring = new Keyring().addSecret('shared-key', 'test-secret');

    it('should throw when signing with an unknown key', () => {
      expect(() => keyring.sign(message, 'other-key', 'hmac-sha256')).toThrow(SignatureError);
      expect(() => keyring.sign(message, 'other-key', 'hmac-sha256')).toThrow('Unknown key: other-key');
    });

    it('should throw when signing with an unsupported algorithm', () => {
      expect(() => keyring.sign(message, 'shared-key', 'rsa-sha256')).toThrow('Unsupported algorithm: rsa-sha256');
    });

    it('should not verify with an unknown key or algorithm', () => {
      const signature = keyring.sign(message, 'shared-key', 'hmac-sha256');

      expect(keyring.has('other-key')).toBe(false);
      expect(keyring.verify(message, signature, 'other-key', 'hmac-sha256')).toBe(false);
      expect(keyring.verify(message, signature, 'shared-key', 'rsa-sha256')).toBe(false);
    });
  });
});
