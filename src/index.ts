/**
 * HTTP Signatures for Node.js
 */

export {
  SignatureEngine,
  DEFAULT_CLOCK_SKEW_SECONDS,
  DEFAULT_REQUIRED_HEADERS,
  type Signer,
  type Verifier,
  type SignatureEngineOptions,
} from './crypto/signature-engine.js';
export {
  parseAuthorization,
  formatAuthorization,
  extractKeyIdFromHeader,
  isSignatureAuthorization,
  type SignatureParameters,
} from './crypto/params.js';
export { buildMessage, getRequestTarget, REQUEST_TARGET } from './crypto/message.js';
export {
  getHeaderLine,
  hasHeader,
  withHeader,
  type HeaderMap,
  type HeaderValue,
  type MessageRequest,
  type MessageResponse,
} from './crypto/request.js';
export { formatHttpDate, parseHttpDate } from './crypto/date.js';
export { computeDigest, parseDigest, verifyDigest, type DigestAlgorithm } from './crypto/digest.js';
export { Keyring, KEYRING_ALGORITHMS, type KeyringAlgorithm } from './crypto/keyring.js';
export { generateKid } from './crypto/kid.js';
export { SignatureError, ConfigurationError, isSignatureError } from './shared/errors.js';
export { loadSignatureConfig, createSignatureEngine, type SignatureConfig } from './config/signature.js';
export { verifySignature, type VerifySignatureOptions } from './middleware/verify-signature.js';
export {
  createSigningFetch,
  type SigningFetchOptions,
  type SigningRequestInit,
  type SigningFetch,
  type FetchFunction,
} from './client/signing-fetch.js';
