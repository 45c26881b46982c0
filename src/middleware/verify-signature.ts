/**
 * Signature verification middleware for Express
 * Verifies HTTP Signatures in the Authorization header
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { verifyDigest } from '../crypto/digest.js';
import { extractKeyIdFromHeader, isSignatureAuthorization } from '../crypto/params.js';
import type { MessageRequest } from '../crypto/request.js';
import type { SignatureEngine } from '../crypto/signature-engine.js';
import { logFailure, logSuccess } from '../shared/audit.js';
import { isSignatureError } from '../shared/errors.js';

declare global {
  namespace Express {
    interface Request {
      /** Raw body, captured by a body parser `verify` hook */
      rawBody?: string | Buffer;
      /** Key id of a verified signature */
      signatureKeyId?: string;
    }
  }
}

export interface VerifySignatureOptions {
  /** Reject requests without a Signature Authorization header (default: let them through) */
  required?: boolean;
  /** Check the Digest header against `req.rawBody` */
  verifyDigest?: boolean;
}

/**
 * Express request as seen by the engine
 */
function toMessageRequest(req: Request): MessageRequest {
  return {
    method: req.method,
    url: req.originalUrl,
    headers: req.headers,
  };
}

/**
 * Respond with `401 Unauthorized`, a challenge per supported algorithm and
 * the error message as body.
 */
function sendUnauthorized(engine: SignatureEngine, req: Request, res: Response, message: string): void {
  res.status(401);

  for (const challenge of engine.getAuthenticateChallenges(req.method)) {
    res.append('WWW-Authenticate', challenge);
  }

  res.type('text/plain').send(message);
}

/**
 * Create middleware that verifies HTTP Signatures
 *
 * Validates:
 * - Scheme and parameters of the Authorization header
 * - Required headers are signed
 * - Date / X-Date within the clock skew
 * - Digest against the raw body (optional)
 * - Cryptographic signature, through the engine's verifier
 *
 * On success the key id is available as `req.signatureKeyId`.
 */
export function verifySignature(
  engine: SignatureEngine,
  options: VerifySignatureOptions = {}
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const endpoint = req.path;
    const method = req.method;
    const authorization = req.get('authorization');

    const signed = authorization !== undefined && isSignatureAuthorization(authorization);

    if (!signed && !options.required) {
      next();
      return;
    }

    const keyId = (authorization === undefined ? undefined : extractKeyIdFromHeader(authorization)) ?? 'unknown';
    const digest = req.get('digest');

    if (signed && options.verifyDigest && digest !== undefined && req.rawBody !== undefined) {
      if (!verifyDigest(req.rawBody, digest)) {
        logFailure(keyId, 'digest_mismatch', endpoint, method);
        res.status(400).type('text/plain').send('Digest header does not match request body');
        return;
      }
    }

    void engine.verifyParameters(toMessageRequest(req)).then(
      (params) => {
        logSuccess(params.keyId, params.headers.split(' '), endpoint, method);
        req.signatureKeyId = params.keyId;
        next();
      },
      (error: unknown) => {
        if (!isSignatureError(error)) {
          next(error);
          return;
        }

        logFailure(keyId, error.message, endpoint, method);
        sendUnauthorized(engine, req, res, error.message);
      }
    );
  };
}
