/**
 * Audit logging utilities for signature verification
 */

import { logger } from './logger.js';

export interface AuditLogEntry {
  keyId: string;
  result: 'ok' | 'fail';
  reason?: string;
  signedHeaders: string[];
  endpoint: string;
  method: string;
}

const auditLogger = logger.child({ component: 'audit' });

/**
 * Log a signature verification attempt
 */
export function logVerificationAttempt(entry: AuditLogEntry): void {
  if (entry.result === 'ok') {
    auditLogger.info(entry, 'signature verified');
  } else {
    auditLogger.warn(entry, 'signature rejected');
  }
}

/**
 * Log successful verification
 */
export function logSuccess(
  keyId: string,
  signedHeaders: string[],
  endpoint: string,
  method: string
): void {
  logVerificationAttempt({
    keyId,
    result: 'ok',
    signedHeaders,
    endpoint,
    method,
  });
}

/**
 * Log failed verification
 */
export function logFailure(
  keyId: string,
  reason: string,
  endpoint: string,
  method: string
): void {
  logVerificationAttempt({
    keyId,
    result: 'fail',
    reason,
    signedHeaders: [],
    endpoint,
    method,
  });
}
