/**
 * Verification of draft-cavage `Authorization: Signature` headers
 */

import {
  KeyResolver,
  ParsedSignature,
  VerificationConfig,
  VerificationError,
  VerificationErrorCode,
  VerificationPolicy,
  VerificationResult
} from './types.js';
import { VERIFICATION_POLICIES, getVerificationPolicy } from './policies.js';
import { KeyMaterial, SignableRequest, SignatureAlgorithm } from '../signing/types.js';
import { buildSigningString, resolveHeaderList } from '../signing/canonical-message.js';
import { verify } from '../signing/crypto.js';
import { verifyDigest } from '../signing/digest.js';
import { toHeaderSource } from '../signing/headers.js';
import { buildRequestTarget, generateTimestamp, parseHttpDate } from '../signing/utils.js';
import { Logger, defaultLogger } from '../utils/logger.js';

const PARAMETER_PATTERN = /\s*([A-Za-z]+)=(?:"([^"]*)"|([^,"]*))\s*(?:,|$)/y;

function parseInteger(name: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new VerificationError(`Parameter '${name}' must be an integer`, 'MALFORMED_SIGNATURE', { value });
  }
  return Number(value);
}

/**
 * Parse the value of an Authorization header using the Signature scheme
 */
export function parseAuthorizationHeader(value: string): ParsedSignature {
  const match = /^\s*signature\s+/i.exec(value);
  if (!match) {
    throw new VerificationError('Authorization header does not use the Signature scheme', 'MALFORMED_SIGNATURE');
  }

  const params: Record<string, string> = {};
  const input = value.slice(match[0].length).trimEnd();
  PARAMETER_PATTERN.lastIndex = 0;

  while (PARAMETER_PATTERN.lastIndex < input.length) {
    const start = PARAMETER_PATTERN.lastIndex;
    const param = PARAMETER_PATTERN.exec(input);
    if (!param) {
      throw new VerificationError('Malformed signature parameters', 'MALFORMED_SIGNATURE', { position: start });
    }
    params[param[1]] = param[2] ?? param[3].trim();
  }

  const { keyId, signature } = params;
  if (keyId === undefined) {
    throw new VerificationError("Missing 'keyId' parameter", 'MALFORMED_SIGNATURE');
  }
  if (signature === undefined) {
    throw new VerificationError("Missing 'signature' parameter", 'MALFORMED_SIGNATURE');
  }

  return {
    keyId,
    signature,
    headers: params.headers,
    created: params.created === undefined ? undefined : parseInteger('created', params.created),
    expires: params.expires === undefined ? undefined : parseInteger('expires', params.expires),
    algorithm: params.algorithm,
    raw: { created: params.created, expires: params.expires }
  };
}

/**
 * Signature verifier bound to a key table and a policy
 */
export class HttpSignatureVerifier {
  private policy: VerificationPolicy;
  private resolveKey: KeyResolver;
  private now: () => Date;
  private logger: Logger;

  constructor(config: VerificationConfig) {
    this.policy = resolvePolicy(config.policy);
    const { keys } = config;
    this.resolveKey =
      typeof keys === 'function'
        ? keys
        : keyId => (Object.prototype.hasOwnProperty.call(keys, keyId) ? keys[keyId] : undefined);
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger ?? defaultLogger;
  }

  getPolicy(): Readonly<VerificationPolicy> {
    return this.policy;
  }

  /**
   * Verify the signature carried by a request. Rejections are returned, not
   * thrown; a key of the wrong type for the algorithm still throws.
   */
  verify(request: SignableRequest): VerificationResult {
    const headers = toHeaderSource(request.headers);
    const authorization = headers.get('authorization');
    if (authorization.length === 0) {
      return this.reject('MISSING_SIGNATURE', 'Authorization header not found');
    }

    let parsed: ParsedSignature;
    try {
      parsed = parseAuthorizationHeader(authorization.join(','));
    } catch (error) {
      if (error instanceof VerificationError) {
        return this.reject(error.code, error.message);
      }
      throw error;
    }

    const context = { keyId: parsed.keyId };
    const requested = parsed.algorithm ?? this.policy.allowedAlgorithms[0];
    const algorithm: SignatureAlgorithm | undefined = this.policy.allowedAlgorithms.find(a => a === requested);
    if (algorithm === undefined) {
      return this.reject('ALGORITHM_NOT_ALLOWED', `Algorithm '${requested}' is not allowed`, context);
    }

    const headerNames = resolveHeaderList(parsed.headers, algorithm);
    const coverage = { ...context, algorithm, headers: headerNames };

    const missing = this.policy.requiredHeaders.filter(name => !headerNames.includes(name));
    if (missing.length > 0) {
      return this.reject('MISSING_REQUIRED_HEADER', `Signature must cover: ${missing.join(' ')}`, coverage);
    }

    const pseudoProblem = checkPseudoHeaders(headerNames, parsed, algorithm);
    if (pseudoProblem) {
      return this.reject('INVALID_PSEUDO_HEADER', pseudoProblem, coverage);
    }

    const now = this.now();
    const freshnessProblem = this.checkFreshness(parsed, headerNames, headers.get('date'), now);
    if (freshnessProblem) {
      return this.reject(freshnessProblem.code, freshnessProblem.message, coverage);
    }

    const key = this.resolveKey(parsed.keyId);
    if (key === undefined) {
      return this.reject('UNKNOWN_KEY_ID', `Unknown keyId '${parsed.keyId}'`, coverage);
    }

    const signingString = buildSigningString(headerNames, {
      requestTarget: buildRequestTarget(request.method, request.path, request.query),
      created: parsed.raw.created ?? '',
      expires: parsed.raw.expires ?? '',
      date: headers.get('date').join(','),
      headers
    });

    if (!this.checkSignature(signingString, parsed.signature, algorithm, key)) {
      return this.reject('INVALID_SIGNATURE', 'Signature does not match', coverage);
    }

    if (this.policy.verifyDigest && request.body !== undefined) {
      const digestHeader = headers.get('digest');
      if (digestHeader.length === 0 || !verifyDigest(request.body, digestHeader.join(','))) {
        return this.reject('INVALID_DIGEST', 'Digest header missing or does not match the body', coverage);
      }
    }

    return { valid: true, status: 'valid', ...coverage };
  }

  private checkSignature(signingString: string, signature: string, algorithm: SignatureAlgorithm, key: KeyMaterial): boolean {
    return verify(signingString, Buffer.from(signature, 'base64'), algorithm, key);
  }

  private checkFreshness(
    parsed: ParsedSignature,
    headerNames: readonly string[],
    dateValues: readonly string[],
    now: Date
  ): { code: VerificationErrorCode; message: string } | undefined {
    const { maxAge, clockSkew } = this.policy;
    const timestamp = generateTimestamp(now);

    if (parsed.created !== undefined) {
      if (parsed.created > timestamp + clockSkew) {
        return { code: 'CREATED_IN_FUTURE', message: `'created' ${parsed.created} is in the future` };
      }
      if (timestamp - parsed.created > maxAge) {
        return { code: 'SIGNATURE_TOO_OLD', message: `Signature is older than ${maxAge} seconds` };
      }
    }

    if (parsed.expires !== undefined && parsed.expires < timestamp - clockSkew) {
      return { code: 'SIGNATURE_EXPIRED', message: `Signature expired at ${parsed.expires}` };
    }

    if (headerNames.includes('date')) {
      const date = dateValues.length === 1 ? parseHttpDate(dateValues[0]) : undefined;
      if (!date) {
        return { code: 'INVALID_DATE', message: 'Date header missing or unreadable' };
      }
      const age = timestamp - generateTimestamp(date);
      if (age > maxAge || age < -clockSkew) {
        return { code: 'INVALID_DATE', message: `Date header is outside the ${maxAge} second window` };
      }
    }

    return undefined;
  }

  private reject(
    code: VerificationErrorCode,
    message: string,
    context: Pick<VerificationResult, 'keyId' | 'algorithm' | 'headers'> = {}
  ): VerificationResult {
    this.logger.debug('Signature rejected', { code, message, keyId: context.keyId });
    return { valid: false, status: 'invalid', ...context, error: { code, message } };
  }
}

/**
 * (created) and (expires) only exist for hs2019 and need their parameter
 */
function checkPseudoHeaders(
  headerNames: readonly string[],
  parsed: ParsedSignature,
  algorithm: SignatureAlgorithm
): string | undefined {
  for (const name of ['(created)', '(expires)'] as const) {
    if (!headerNames.includes(name)) {
      continue;
    }
    if (algorithm !== 'hs2019') {
      return `${name} cannot be signed with ${algorithm}`;
    }
    const value = name === '(created)' ? parsed.created : parsed.expires;
    if (value === undefined) {
      return `${name} is covered but its parameter is missing`;
    }
  }
  return undefined;
}

function resolvePolicy(policy: VerificationPolicy | string = 'standard'): VerificationPolicy {
  if (typeof policy !== 'string') {
    return policy;
  }
  const found = getVerificationPolicy(policy);
  if (!found) {
    throw new VerificationError(`Unknown verification policy: ${policy}`, 'UNKNOWN_POLICY', {
      availablePolicies: Object.keys(VERIFICATION_POLICIES)
    });
  }
  return found;
}

export function createVerifier(config: VerificationConfig): HttpSignatureVerifier {
  return new HttpSignatureVerifier(config);
}

/**
 * One-shot verification with a single key
 */
export function verifyRequestSignature(
  request: SignableRequest,
  key: KeyMaterial,
  policy: VerificationPolicy | string = 'standard'
): VerificationResult {
  return new HttpSignatureVerifier({ keys: () => key, policy }).verify(request);
}
