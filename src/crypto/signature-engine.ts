/**
 * HTTP Signatures (draft-cavage-http-signatures)
 * https://datatracker.ietf.org/doc/html/draft-cavage-http-signatures
 *
 * Signs outgoing requests and verifies incoming ones using the
 * `Authorization: Signature ...` header. The cryptography itself is done by
 * the injected signer and verifier.
 */

import { ConfigurationError, SignatureError } from '../shared/errors.js';
import { diffInSeconds, formatHttpDate, parseHttpDate } from './date.js';
import { buildMessage, REQUEST_TARGET, substituteDateHeader } from './message.js';
import {
  assertParameters,
  formatAuthorization,
  formatChallenge,
  parseAuthorization,
  type SignatureParameters,
} from './params.js';
import {
  getHeaderLine,
  hasHeader,
  withAddedHeader,
  withHeader,
  type MessageRequest,
  type MessageResponse,
} from './request.js';

/**
 * Clock skew tolerance (5 minutes)
 */
export const DEFAULT_CLOCK_SKEW_SECONDS = 5 * 60;

/**
 * Headers covered by the signature unless configured otherwise
 */
export const DEFAULT_REQUIRED_HEADERS = [REQUEST_TARGET, 'date'] as const;

export interface Signer {
  /**
   * Sign the message with the key identified by `keyId`
   */
  sign(message: Buffer, keyId: string, algorithm: string): Uint8Array | Promise<Uint8Array>;
}

export interface Verifier {
  /**
   * Check a signature. Must resolve to false (not throw) for an unknown key
   * or a bad signature.
   */
  verify(
    message: Buffer,
    signature: Buffer,
    keyId: string,
    algorithm: string
  ): boolean | Promise<boolean>;
}

export interface SignatureEngineOptions {
  /** Supported algorithm(s) */
  algorithms: string | readonly string[];
  signer: Signer;
  verifier: Verifier;
  /** Max age of the Date / X-Date header in seconds */
  clockSkew?: number;
  /** Headers that must be signed, per lower-cased method or 'default' */
  requiredHeaders?: Readonly<Record<string, readonly string[]>>;
  /** Seed of the nonce counter; nonces are only sent together with a client id */
  nonce?: number;
}

interface NonceCounter {
  value: number;
}

interface EngineState {
  algorithms: readonly string[];
  signer: Signer;
  verifier: Verifier;
  clockSkew: number;
  /** Lower-cased method or 'default' to lower-cased headers */
  requiredHeaders: ReadonlyMap<string, readonly string[]>;
  nonce: NonceCounter | null;
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function sameList(a: readonly string[] | undefined, b: readonly string[]): boolean {
  return a !== undefined && a.length === b.length && a.every((value, i) => value === b[i]);
}

function lowerCaseAll(headers: readonly string[]): string[] {
  return headers.map((header) => header.toLowerCase());
}

function assertClockSkew(clockSkew: number): void {
  if (!Number.isInteger(clockSkew) || clockSkew < 0) {
    throw new ConfigurationError(`Clock skew should be a non-negative integer, got ${clockSkew}`);
  }
}

function assertNonce(nonce: number): void {
  if (!Number.isSafeInteger(nonce) || nonce < 0) {
    throw new ConfigurationError(`Nonce should be a non-negative integer, got ${nonce}`);
  }
}

/**
 * Create and verify HTTP Signatures.
 *
 * The engine is immutable: `withAlgorithm`, `withClockSkew`,
 * `withRequiredHeaders` and `withNonce` return a modified copy.
 */
export class SignatureEngine {
  private state: EngineState;

  constructor(options: SignatureEngineOptions) {
    const algorithms = typeof options.algorithms === 'string'
      ? [options.algorithms]
      : [...options.algorithms];

    if (algorithms.length === 0) {
      throw new ConfigurationError('No supported algorithms specified');
    }

    const clockSkew = options.clockSkew ?? DEFAULT_CLOCK_SKEW_SECONDS;
    assertClockSkew(clockSkew);

    const requiredHeaders = new Map<string, readonly string[]>([['default', [...DEFAULT_REQUIRED_HEADERS]]]);
    for (const [method, headers] of Object.entries(options.requiredHeaders ?? {})) {
      requiredHeaders.set(method.toLowerCase(), lowerCaseAll(headers));
    }

    if (options.nonce !== undefined) {
      assertNonce(options.nonce);
    }

    this.state = {
      algorithms,
      signer: options.signer,
      verifier: options.verifier,
      clockSkew,
      requiredHeaders,
      nonce: options.nonce === undefined ? null : { value: options.nonce },
    };
  }

  private copy(changes: Partial<EngineState>): SignatureEngine {
    const { algorithms, signer, verifier } = this.state;
    const clone = new SignatureEngine({ algorithms, signer, verifier });
    clone.state = { ...this.state, ...changes };
    return clone;
  }

  /**
   * Get supported cryptography algorithms
   */
  getSupportedAlgorithms(): readonly string[] {
    return this.state.algorithms;
  }

  /**
   * Get a copy of the engine where only the given algorithm is supported
   *
   * @throws ConfigurationError if the algorithm isn't supported
   */
  withAlgorithm(algorithm: string): SignatureEngine {
    if (sameList(this.state.algorithms, [algorithm])) {
      return this;
    }

    if (!this.state.algorithms.includes(algorithm)) {
      throw new ConfigurationError(`Unsupported algorithm: ${algorithm}`);
    }

    return this.copy({ algorithms: [algorithm] });
  }

  /**
   * Get the max clock offset in seconds
   */
  getClockSkew(): number {
    return this.state.clockSkew;
  }

  /**
   * Get a copy of the engine with a different max clock offset
   */
  withClockSkew(clockSkew: number = DEFAULT_CLOCK_SKEW_SECONDS): SignatureEngine {
    if (this.state.clockSkew === clockSkew) {
      return this;
    }

    assertClockSkew(clockSkew);

    return this.copy({ clockSkew });
  }

  /**
   * Get the headers that must be part of the signature
   *
   * @param method - HTTP request method
   */
  getRequiredHeaders(method: string): readonly string[] {
    const { requiredHeaders } = this.state;
    return requiredHeaders.get(method.toLowerCase()) ?? requiredHeaders.get('default') ?? [];
  }

  /**
   * Get a copy of the engine with different required headers
   *
   * @param method - HTTP request method or 'default'
   */
  withRequiredHeaders(method: string, headers: readonly string[]): SignatureEngine {
    const key = method.toLowerCase();
    const lowerCased = lowerCaseAll(headers);

    if (sameList(this.state.requiredHeaders.get(key), lowerCased)) {
      return this;
    }

    const requiredHeaders = new Map(this.state.requiredHeaders);
    requiredHeaders.set(key, lowerCased);

    return this.copy({ requiredHeaders });
  }

  /**
   * Get a copy of the engine that sends a nonce with each request signed for a client.
   * The copy starts a new counter at `seed`; the next nonce sent is `seed + 1`.
   */
  withNonce(seed: number): SignatureEngine {
    assertNonce(seed);

    return this.copy({ nonce: { value: seed } });
  }

  /**
   * Sign a request
   *
   * @param request - Request to sign; it is not modified
   * @param keyId - Public key or key reference
   * @param algorithm - Must be specified if more than one algorithm is supported
   * @param clientId - Client identifier, sent together with a nonce
   * @returns Copy of the request with Date and Authorization headers
   * @throws SignatureError for an unsupported or unspecified algorithm
   */
  async sign<T extends MessageRequest>(
    request: T,
    keyId: string,
    algorithm?: string,
    clientId?: string
  ): Promise<T> {
    const signAlgorithm = this.getSignAlgorithm(algorithm);

    let dated = request;
    if (!hasHeader(request, 'date') && !hasHeader(request, 'x-date')) {
      dated = withHeader(request, 'Date', formatHttpDate(new Date()));
    }

    const headers = substituteDateHeader(dated, this.getRequiredHeaders(dated.method));
    const message = buildMessage(dated, headers);

    const rawSignature: unknown = await this.state.signer.sign(
      Buffer.from(message, 'utf-8'),
      keyId,
      signAlgorithm
    );

    if (!(rawSignature instanceof Uint8Array)) {
      throw new TypeError(`Expected Uint8Array, ${typeof rawSignature} given`);
    }

    const params: SignatureParameters = {
      keyId,
      algorithm: signAlgorithm,
      headers: headers.join(' '),
      signature: Buffer.from(rawSignature).toString('base64'),
    };

    if (clientId !== undefined) {
      params.clientId = clientId;
      const nonce = this.nextNonce();
      if (nonce !== undefined) {
        params.nonce = String(nonce);
      }
    }

    return withHeader(dated, 'Authorization', formatAuthorization(params));
  }

  /**
   * Verify the signature of a request
   *
   * @returns The `keyId` parameter
   * @throws SignatureError if the request isn't correctly signed
   */
  async verify(request: MessageRequest): Promise<string> {
    const params = await this.verifyParameters(request);
    return params.keyId;
  }

  /**
   * Verify the signature of a request
   *
   * @returns All signature parameters
   * @throws SignatureError if the request isn't correctly signed
   */
  async verifyParameters(request: MessageRequest): Promise<SignatureParameters> {
    const params = this.getParams(request);

    const headers = params.headers.split(' ').filter((header) => header !== '');
    this.assertRequiredHeaders(request.method, headers);
    this.assertSignatureAge(request);

    if (!BASE64_PATTERN.test(params.signature)) {
      throw new SignatureError('signature is not valid base64');
    }

    const message = buildMessage(request, headers);
    const signature = Buffer.from(params.signature, 'base64');

    const verified = await this.state.verifier.verify(
      Buffer.from(message, 'utf-8'),
      signature,
      params.keyId,
      params.algorithm
    );

    if (!verified) {
      throw new SignatureError('invalid signature');
    }

    return params;
  }

  /**
   * Get a `WWW-Authenticate` challenge for each supported algorithm
   */
  getAuthenticateChallenges(method: string): string[] {
    const headers = this.getRequiredHeaders(method);
    return this.state.algorithms.map((algorithm) => formatChallenge(algorithm, headers));
  }

  /**
   * Add the `WWW-Authenticate` challenges (for a 401 response).
   * Existing `WWW-Authenticate` values are kept.
   */
  setAuthenticateResponseHeader<T extends MessageResponse>(method: string, response: T): T {
    return this.getAuthenticateChallenges(method).reduce(
      (current, challenge) => withAddedHeader(current, 'WWW-Authenticate', challenge),
      response
    );
  }

  /**
   * Extract and validate the Signature parameters
   */
  private getParams(request: MessageRequest): SignatureParameters {
    const authorization = getHeaderLine(request, 'authorization');
    if (authorization === undefined) {
      throw new SignatureError('missing "Authorization" header');
    }

    const params = assertParameters(parseAuthorization(authorization));

    if (!this.state.algorithms.includes(params.algorithm)) {
      throw new SignatureError(`signed with unsupported algorithm: ${params.algorithm}`);
    }

    return params;
  }

  /**
   * Assert that every required header is signed; x-date counts as date
   */
  private assertRequiredHeaders(method: string, headers: readonly string[]): void {
    const signed = headers.map((header) => (header.toLowerCase() === 'x-date' ? 'date' : header.toLowerCase()));
    const missing = this.getRequiredHeaders(method).filter((header) => !signed.includes(header));

    if (missing.length > 0) {
      const verb = missing.length === 1 ? 'is' : 'are';
      throw new SignatureError(`${missing.join(', ')} ${verb} not part of signature`);
    }
  }

  /**
   * Assert that the signature is not too old (or from the future)
   */
  private assertSignatureAge(request: MessageRequest): void {
    const dateString = getHeaderLine(request, 'x-date') ?? getHeaderLine(request, 'date');

    // Date should be a required header, so normally it's always there.
    if (dateString === undefined) {
      return;
    }

    const date = parseHttpDate(dateString);
    if (date === null) {
      throw new SignatureError('invalid date header');
    }

    if (diffInSeconds(new Date(), date) > this.state.clockSkew) {
      throw new SignatureError('signature to old or system clocks out of sync');
    }
  }

  private getSignAlgorithm(algorithm: string | undefined): string {
    const { algorithms } = this.state;

    if (algorithm === undefined) {
      if (algorithms.length > 1) {
        throw new SignatureError('Multiple algorithms available; no algorithm specified');
      }
      return algorithms[0];
    }

    if (!algorithms.includes(algorithm)) {
      throw new SignatureError(`Unsupported algorithm: ${algorithm}`);
    }

    return algorithm;
  }

  private nextNonce(): number | undefined {
    const counter = this.state.nonce;
    if (counter === null) {
      return undefined;
    }

    if (counter.value >= Number.MAX_SAFE_INTEGER) {
      throw new RangeError('Nonce counter exhausted');
    }

    counter.value += 1;
    return counter.value;
  }
}
