/**
 * Digest header values (RFC 3230, section 4.3.2)
 */

import { createHash } from 'node:crypto';
import { UnsupportedAlgorithmError } from './types.js';
import { toBuffer } from './utils.js';

/**
 * Digest algorithm names (upper-cased) mapped to node hash names
 */
const DIGEST_ALGORITHMS: Record<string, string> = {
  'SHA-256': 'sha256',
  'SHA-512': 'sha512',
  SHA: 'sha1'
};

export const DEFAULT_DIGEST_ALGORITHM = 'SHA-256';

function hashName(algorithm: string): string | undefined {
  return DIGEST_ALGORITHMS[algorithm.toUpperCase()];
}

export function isDigestAlgorithm(algorithm: string): boolean {
  return hashName(algorithm) !== undefined;
}

/**
 * Base64 hash of a body for a single digest algorithm
 */
export function calculateDigest(body: string | Uint8Array, algorithm: string = DEFAULT_DIGEST_ALGORITHM): string {
  const name = hashName(algorithm);
  if (!name) {
    throw new UnsupportedAlgorithmError(algorithm);
  }
  return createHash(name).update(toBuffer(body)).digest('base64');
}

/**
 * Hash a body once per algorithm and format the Digest header value
 */
export function digest(
  body: string | Uint8Array,
  algorithms: readonly string[] | ReadonlySet<string> = [DEFAULT_DIGEST_ALGORITHM]
): string {
  const digests = new Map<string, string>();
  for (const algorithm of algorithms) {
    digests.set(algorithm, calculateDigest(body, algorithm));
  }
  return digestFromMap(digests);
}

/**
 * Format precomputed digests without hashing anything
 */
export function digestFromMap(digests: Record<string, string> | Map<string, string>): string {
  const entries = digests instanceof Map ? [...digests.entries()] : Object.entries(digests);
  return entries.map(([algorithm, value]) => `${algorithm}=${value}`).join(',');
}

/**
 * Parse a Digest header value into upper-cased algorithm -> value
 */
export function parseDigestHeader(value: string): Map<string, string> {
  const digests = new Map<string, string>();
  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    const separator = trimmed.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    digests.set(trimmed.slice(0, separator).toUpperCase(), trimmed.slice(separator + 1));
  }
  return digests;
}

/**
 * True when the header carries at least one recognized digest and every
 * recognized digest matches the body
 */
export function verifyDigest(body: string | Uint8Array, headerValue: string): boolean {
  let checked = 0;
  for (const [algorithm, value] of parseDigestHeader(headerValue)) {
    if (!isDigestAlgorithm(algorithm)) {
      continue;
    }
    if (calculateDigest(body, algorithm) !== value) {
      return false;
    }
    checked++;
  }
  return checked > 0;
}
