/**
 * draft-cavage HTTP Signatures signer
 */

import {
  HeaderSink,
  KeyMaterial,
  SignableRequest,
  SignatureOptions,
  SignatureResult,
  SigningError
} from './types.js';
import { HeaderMap } from './headers.js';
import { resolveSignature } from './signature-params.js';
import { digest, digestFromMap } from './digest.js';
import { SigningConfig, validateSigningConfig } from './signing-config.js';
import { Logger, defaultLogger } from '../utils/logger.js';

/**
 * Sign a request and return the header values without touching the request
 */
export function signRequest(
  request: SignableRequest,
  key: KeyMaterial,
  keyId: string,
  options: SignatureOptions = {}
): SignatureResult {
  return resolveSignature(request, key, keyId, options);
}

/**
 * Write the Date and Authorization headers of a signature to a sink
 */
export function applySignatureHeaders(sink: HeaderSink, result: SignatureResult): void {
  sink.set('date', result.headers.date);
  sink.set('authorization', result.headers.authorization);
}

/**
 * Return a copy of the request carrying Date and Authorization headers.
 * If signing throws, no headers are written.
 */
export function withSignature(
  request: SignableRequest,
  key: KeyMaterial,
  keyId: string,
  options: SignatureOptions = {}
): SignableRequest {
  const result = signRequest(request, key, keyId, options);
  const headers = new HeaderMap(request.headers);
  applySignatureHeaders(headers, result);
  return { ...request, headers };
}

/**
 * Return a copy of the request carrying a Digest header. A body is hashed
 * with SHA-256; a map of algorithm to value is used as given.
 */
export function withDigest(
  request: SignableRequest,
  bodyOrDigests: string | Uint8Array | Record<string, string> | Map<string, string>
): SignableRequest {
  const value =
    typeof bodyOrDigests === 'string' || bodyOrDigests instanceof Uint8Array
      ? digest(bodyOrDigests)
      : digestFromMap(bodyOrDigests);

  const headers = new HeaderMap(request.headers);
  headers.set('digest', value);
  return { ...request, headers };
}

/**
 * Signer bound to one key, with default options
 */
export class HttpSigner {
  private config: SigningConfig;
  private logger: Logger;

  constructor(config: SigningConfig) {
    validateSigningConfig(config);
    this.config = { ...config, defaults: { ...config.defaults } };
    this.logger = config.logger ?? defaultLogger;
  }

  /**
   * Sign a request; per-call options are merged over the configured defaults
   */
  sign(request: SignableRequest, options: SignatureOptions = {}): SignatureResult {
    const merged: SignatureOptions = { ...this.config.defaults, ...options };

    try {
      const result = signRequest(request, this.config.key, this.config.keyId, merged);
      this.logger.debug('Request signed', {
        keyId: this.config.keyId,
        algorithm: result.parameters.algorithm,
        headers: result.parameters.headers,
        signingString: result.signingString
      });
      return result;
    } catch (error) {
      this.logger.warn('Request signing failed', {
        keyId: this.config.keyId,
        method: request.method,
        path: request.path,
        error: error instanceof Error ? error.message : String(error)
      });
      if (error instanceof SigningError) {
        throw error;
      }
      throw new SigningError(
        `Request signing failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        'SIGNING_FAILED',
        { originalError: error instanceof Error ? error.message : 'Unknown error' }
      );
    }
  }

  /**
   * Sign a request and return a copy carrying the signature headers
   */
  apply(request: SignableRequest, options: SignatureOptions = {}): SignableRequest {
    const result = this.sign(request, options);
    const headers = new HeaderMap(request.headers);
    applySignatureHeaders(headers, result);
    return { ...request, headers };
  }

  getKeyId(): string {
    return this.config.keyId;
  }

  /**
   * Default options (copy)
   */
  getDefaults(): Readonly<SignatureOptions> {
    return { ...this.config.defaults };
  }
}

export function createSigner(config: SigningConfig): HttpSigner {
  return new HttpSigner(config);
}
