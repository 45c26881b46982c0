/**
 * Signature configuration from the environment
 *
 * HTTP_SIGNATURE_ALGORITHMS        comma separated, e.g. "ed25519,hmac-sha256"
 * HTTP_SIGNATURE_CLOCK_SKEW        seconds (default 300)
 * HTTP_SIGNATURE_REQUIRED_HEADERS  JSON, e.g. {"post":["(request-target)","date","digest"]}
 * HTTP_SIGNATURE_NONCE             seed of the nonce counter (optional)
 */

import { ConfigurationError } from '../shared/errors.js';
import {
  validateAlgorithms,
  validateNonNegativeInteger,
  validateRequiredHeaders,
} from '../shared/schemas.js';
import {
  DEFAULT_CLOCK_SKEW_SECONDS,
  SignatureEngine,
  type Signer,
  type Verifier,
} from '../crypto/signature-engine.js';

export interface SignatureConfig {
  algorithms: string[];
  clockSkew: number;
  requiredHeaders: Record<string, string[]>;
  nonce?: number;
}

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Load the configuration
 *
 * @throws ConfigurationError for a missing or invalid setting
 */
export function loadSignatureConfig(env: Environment = process.env): SignatureConfig {
  const algorithms = validateAlgorithms(env.HTTP_SIGNATURE_ALGORITHMS);
  if (!algorithms.valid || !algorithms.data) {
    throw new ConfigurationError(`HTTP_SIGNATURE_ALGORITHMS: ${algorithms.error}`);
  }

  let clockSkew = DEFAULT_CLOCK_SKEW_SECONDS;
  if (env.HTTP_SIGNATURE_CLOCK_SKEW !== undefined) {
    const result = validateNonNegativeInteger('Clock skew', env.HTTP_SIGNATURE_CLOCK_SKEW);
    if (!result.valid || result.data === undefined) {
      throw new ConfigurationError(`HTTP_SIGNATURE_CLOCK_SKEW: ${result.error}`);
    }
    clockSkew = result.data;
  }

  let requiredHeaders: Record<string, string[]> = {};
  if (env.HTTP_SIGNATURE_REQUIRED_HEADERS !== undefined) {
    const result = validateRequiredHeaders(env.HTTP_SIGNATURE_REQUIRED_HEADERS);
    if (!result.valid || !result.data) {
      throw new ConfigurationError(`HTTP_SIGNATURE_REQUIRED_HEADERS: ${result.error}`);
    }
    requiredHeaders = result.data;
  }

  const config: SignatureConfig = { algorithms: algorithms.data, clockSkew, requiredHeaders };

  if (env.HTTP_SIGNATURE_NONCE !== undefined) {
    const result = validateNonNegativeInteger('Nonce', env.HTTP_SIGNATURE_NONCE);
    if (!result.valid || result.data === undefined) {
      throw new ConfigurationError(`HTTP_SIGNATURE_NONCE: ${result.error}`);
    }
    config.nonce = result.data;
  }

  return config;
}

/**
 * Create an engine for the configuration
 */
export function createSignatureEngine(
  config: SignatureConfig,
  signer: Signer,
  verifier: Verifier
): SignatureEngine {
  let engine = new SignatureEngine({ algorithms: config.algorithms, signer, verifier })
    .withClockSkew(config.clockSkew);

  for (const [method, headers] of Object.entries(config.requiredHeaders)) {
    engine = engine.withRequiredHeaders(method, headers);
  }

  return config.nonce === undefined ? engine : engine.withNonce(config.nonce);
}
