/**
 * Type definitions for request signing functionality
 */

import type { KeyObject } from 'node:crypto';

/**
 * HTTP methods supported by the signed dispatch helpers
 */
export type HttpMethod =
  | 'GET'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'
  | 'OPTIONS'
  | 'CONNECT'
  | 'TRACE'
  | 'HEAD';

/**
 * Signature algorithm identifiers
 */
export type SignatureAlgorithm = 'hs2019' | 'rsa-sha256' | 'rsa-sha1' | 'ecdsa-sha256' | 'hmac-sha256';

/**
 * RSA or EC key (KeyObject or PEM), or a shared HMAC secret
 */
export type KeyMaterial = KeyObject | string | Uint8Array;

/**
 * Read access to request headers. Lookups are case-insensitive and return
 * every value in the order it was added.
 */
export interface HeaderSource {
  get(name: string): readonly string[];
}

/**
 * Write access to request headers
 */
export interface HeaderSink {
  set(name: string, value: string): void;
}

/**
 * Plain header record accepted wherever a HeaderSource is
 */
export type HeaderRecord = Record<string, string | readonly string[]>;

/**
 * Request to be signed
 */
export interface SignableRequest {
  method: string;
  path: string;
  /** Query string without the leading '?'; empty means none */
  query?: string;
  headers: HeaderSource | HeaderRecord;
  body?: string | Uint8Array;
}

/**
 * Resolved signature parameters, in wire order. An empty string means the
 * parameter is left out of the Authorization header.
 */
export interface SignatureParameters {
  keyId: string;
  signature: string;
  headers: string;
  created: string;
  expires: string;
  algorithm: string;
}

/**
 * Options for a single signing call
 */
export interface SignatureOptions {
  /** Signing algorithm, or a list whose head is used for signing */
  algorithms?: SignatureAlgorithm | readonly SignatureAlgorithm[];
  /** (Pseudo-)headers to sign, as a space-separated string or a list */
  headers?: string | readonly string[];
  /** Replaces the computed "(request-target)" value */
  requestTarget?: string;
  /** Seconds to shift 'created' and the Date header into the past; null omits 'created' */
  age?: number | null;
  /** Replaces the computed 'created' value; '' omits it */
  created?: string | number;
  /** Replaces the computed Date header */
  date?: string;
  /** Seconds from now until the signature expires */
  expiresIn?: number | null;
  /** Replaces the computed 'expires' value; '' omits it */
  expires?: string | number;
  /** Replaces the whole signing string */
  toBeSigned?: string;
  /** Replaces the computed signature (base64) */
  signature?: string;
  keyIdOverride?: string;
  algorithmOverride?: string;
  signatureOverride?: string;
  headersOverride?: string;
  createdOverride?: string | number;
  expiresOverride?: string | number;
  /** Clock used for 'created', 'expires' and the Date header */
  now?: () => Date;
}

/**
 * Output of a signing call
 */
export interface SignatureResult {
  /** Authorization header value, 'Signature ...' */
  authorization: string;
  /** Date header value */
  date: string;
  /** String the signature was computed over */
  signingString: string;
  /** Parameters as serialized, after overrides */
  parameters: SignatureParameters;
  /** Headers to attach to the outgoing request */
  headers: { authorization: string; date: string };
}

/**
 * Error types for signing operations
 */
export class SigningError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SigningError';
  }
}

export class UnsupportedAlgorithmError extends SigningError {
  constructor(public readonly algorithm: string) {
    super(`Unsupported algorithm: ${algorithm}`, 'UNSUPPORTED_ALGORITHM', { algorithm });
    this.name = 'UnsupportedAlgorithmError';
  }
}

export class KeyMismatchError extends SigningError {
  constructor(message: string, algorithm: string) {
    super(message, 'KEY_MISMATCH', { algorithm });
    this.name = 'KeyMismatchError';
  }
}

export class MissingRequiredOptionError extends SigningError {
  constructor(public readonly option: string) {
    super(`Missing required option: ${option}`, 'MISSING_REQUIRED_OPTION', { option });
    this.name = 'MissingRequiredOptionError';
  }
}
