/**
 * Type definitions for signature verification functionality
 */

import type { KeyMaterial, SignatureAlgorithm } from '../signing/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Verification result status
 */
export type VerificationStatus = 'valid' | 'invalid';

/**
 * Reasons a presented signature is rejected
 */
export type VerificationErrorCode =
  | 'MISSING_SIGNATURE'
  | 'MALFORMED_SIGNATURE'
  | 'ALGORITHM_NOT_ALLOWED'
  | 'MISSING_REQUIRED_HEADER'
  | 'INVALID_PSEUDO_HEADER'
  | 'CREATED_IN_FUTURE'
  | 'SIGNATURE_TOO_OLD'
  | 'SIGNATURE_EXPIRED'
  | 'INVALID_DATE'
  | 'UNKNOWN_KEY_ID'
  | 'INVALID_SIGNATURE'
  | 'INVALID_DIGEST'
  | 'UNKNOWN_POLICY';

/**
 * Verification policy
 */
export interface VerificationPolicy {
  name: string;
  description: string;
  /** Accepted algorithms; the first is assumed when the header names none */
  allowedAlgorithms: readonly SignatureAlgorithm[];
  /** (Pseudo-)headers every signature must cover */
  requiredHeaders: readonly string[];
  /** Maximum age in seconds of 'created' and the Date header */
  maxAge: number;
  /** Tolerated clock difference in seconds */
  clockSkew: number;
  /** Check the Digest header of requests with a body */
  verifyDigest: boolean;
}

/**
 * Looks up the key for a keyId; undefined when the keyId is unknown
 */
export type KeyResolver = (keyId: string) => KeyMaterial | undefined;

/**
 * Verification configuration
 */
export interface VerificationConfig {
  /** Key table or resolver */
  keys: Record<string, KeyMaterial> | KeyResolver;
  /** Policy object, or the name of a built-in policy (default 'standard') */
  policy?: VerificationPolicy | string;
  /** Clock used for freshness checks */
  now?: () => Date;
  logger?: Logger;
}

/**
 * Parsed `Authorization: Signature ...` parameters
 */
export interface ParsedSignature {
  keyId: string;
  signature: string;
  headers?: string;
  created?: number;
  expires?: number;
  algorithm?: string;
  /** 'created' and 'expires' exactly as written, for rebuilding the signing string */
  raw: { created?: string; expires?: string };
}

/**
 * Verification outcome
 */
export interface VerificationResult {
  valid: boolean;
  status: VerificationStatus;
  keyId?: string;
  algorithm?: string;
  /** Header list the signature covers */
  headers?: string[];
  error?: {
    code: VerificationErrorCode;
    message: string;
  };
}

/**
 * Error raised while parsing signature headers
 */
export class VerificationError extends Error {
  constructor(
    message: string,
    public readonly code: VerificationErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'VerificationError';
  }
}
