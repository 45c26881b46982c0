import { createSignatureEngine, loadSignatureConfig } from './signature.js';
import { Keyring } from '../crypto/keyring.js';
import type { MessageRequest } from '../crypto/request.js';
import { ConfigurationError } from '../shared/errors.js';
import {
  validateAlgorithms,
  validateNonNegativeInteger,
  validateRequiredHeaders,
} from '../shared/schemas.js';

describe('Signature configuration', () => {
  describe('loadSignatureConfig', () => {
    it('should use defaults for optional settings', () => {
      const config = loadSignatureConfig({ HTTP_SIGNATURE_ALGORITHMS: 'hmac-sha256' });

      expect(config).toEqual({ algorithms: ['hmac-sha256'], clockSkew: 300, requiredHeaders: {} });
    });

    it('should load all settings', () => {
      const config = loadSignatureConfig({
        HTTP_SIGNATURE_ALGORITHMS: 'ed25519, hmac-sha256',
        HTTP_SIGNATURE_CLOCK_SKEW: '60',
        HTTP_SIGNATURE_REQUIRED_HEADERS: '{"POST":["(request-target)","Date","Digest"]}',
        HTTP_SIGNATURE_NONCE: '10',
      });

      expect(config).toEqual({
        algorithms: ['ed25519', 'hmac-sha256'],
        clockSkew: 60,
        requiredHeaders: { post: ['(request-target)', 'date', 'digest'] },
        nonce: 10,
      });
    });

    it('should require algorithms', () => {
      expect(() => loadSignatureConfig({})).toThrow(ConfigurationError);
      expect(() => loadSignatureConfig({})).toThrow(
        'HTTP_SIGNATURE_ALGORITHMS: At least one algorithm is required'
      );
    });

    it('should name the invalid setting', () => {
      expect(() =>
        loadSignatureConfig({ HTTP_SIGNATURE_ALGORITHMS: 'hmac-sha256', HTTP_SIGNATURE_CLOCK_SKEW: '-1' })
      ).toThrow('HTTP_SIGNATURE_CLOCK_SKEW: Clock skew must be a non-negative integer');

      expect(() =>
        loadSignatureConfig({ HTTP_SIGNATURE_ALGORITHMS: 'hmac-sha256', HTTP_SIGNATURE_NONCE: 'abc' })
      ).toThrow('HTTP_SIGNATURE_NONCE: Nonce must be a non-negative integer');

      expect(() =>
        loadSignatureConfig({ HTTP_SIGNATURE_ALGORITHMS: 'hmac-sha256', HTTP_SIGNATURE_REQUIRED_HEADERS: '[' })
      ).toThrow('HTTP_SIGNATURE_REQUIRED_HEADERS: Required headers must be valid JSON');
    });
  });

  describe('createSignatureEngine', () => {
    const keyring = new Keyring().addSecret('shared-key', 'test-secret');

    it('should configure the engine', () => {
      const engine = createSignatureEngine(
        {
          algorithms: ['hmac-sha256', 'ed25519'],
          clockSkew: 60,
          requiredHeaders: { post: ['(request-target)', 'date', 'digest'] },
        },
        keyring,
        keyring
      );

      expect(engine.getSupportedAlgorithms()).toEqual(['hmac-sha256', 'ed25519']);
      expect(engine.getClockSkew()).toBe(60);
      expect(engine.getRequiredHeaders('POST')).toEqual(['(request-target)', 'date', 'digest']);
      expect(engine.getRequiredHeaders('GET')).toEqual(['(request-target)', 'date']);
    });

    it('should start the nonce counter at the configured seed', async () => {
      const engine = createSignatureEngine(
        { algorithms: ['hmac-sha256'], clockSkew: 300, requiredHeaders: {}, nonce: 7 },
        keyring,
        keyring
      );

      const message: MessageRequest = {
        method: 'GET',
        url: '/foos',
        headers: { Date: 'Sat, 22 Aug 1981 20:52:00 +0000' },
      };

      const signed = await engine.sign(message, 'shared-key', undefined, 'client-1');

      expect(signed.headers.Authorization).toContain('clientId="client-1",nonce="8",');
    });
  });
});

describe('Configuration validation', () => {
  describe('validateAlgorithms', () => {
    it('should split and trim the list', () => {
      expect(validateAlgorithms(' ed25519 ,hmac-sha256')).toEqual({
        valid: true,
        data: ['ed25519', 'hmac-sha256'],
      });
    });

    it('should reject empty names', () => {
      expect(validateAlgorithms('ed25519,,hmac-sha256')).toEqual({
        valid: false,
        error: 'Algorithm names cannot be empty',
      });
    });

    it('should reject invalid characters', () => {
      expect(validateAlgorithms('ed 25519').valid).toBe(false);
    });
  });

  describe('validateNonNegativeInteger', () => {
    it.each([
      ['0', 0],
      [' 300 ', 300],
    ])('should accept %s', (value, expected) => {
      expect(validateNonNegativeInteger('Clock skew', value)).toEqual({ valid: true, data: expected });
    });

    it.each(['-1', '1.5', '', 'abc'])('should reject %s', (value) => {
      expect(validateNonNegativeInteger('Clock skew', value)).toEqual({
        valid: false,
        error: 'Clock skew must be a non-negative integer',
      });
    });

    it('should reject an unsafe integer', () => {
      expect(validateNonNegativeInteger('Nonce', '9007199254740992')).toEqual({
        valid: false,
        error: 'Nonce is too large',
      });
    });
  });

  describe('validateRequiredHeaders', () => {
    it('should lower-case methods and headers', () => {
      expect(validateRequiredHeaders('{"Default":["(request-target)","Date"]}')).toEqual({
        valid: true,
        data: { default: ['(request-target)', 'date'] },
      });
    });

    it.each([
      ['["date"]', 'Required headers must be an object of method to header list'],
      ['null', 'Required headers must be an object of method to header list'],
      ['{"p0st":["date"]}', 'Invalid method "p0st"'],
      ['{"post":"date"}', 'Headers for "post" must be an array of strings'],
      ['{"post":["date header"]}', 'Headers for "post" contain an invalid header name'],
    ])('should reject %s', (value, error) => {
      expect(validateRequiredHeaders(value)).toEqual({ valid: false, error });
    });
  });
});
