/**
 * Predefined verification policies
 */

import { VerificationPolicy } from './types.js';
import { SUPPORTED_ALGORITHMS } from '../signing/crypto.js';

/**
 * hs2019 signatures, no mandatory coverage
 */
export const STANDARD_VERIFICATION_POLICY: VerificationPolicy = {
  name: 'standard',
  description: 'hs2019 signatures with a five minute freshness window',
  allowedAlgorithms: ['hs2019'],
  requiredHeaders: [],
  maxAge: 300, // 5 minutes
  clockSkew: 30,
  verifyDigest: false
};

export const STRICT_VERIFICATION_POLICY: VerificationPolicy = {
  name: 'strict',
  description: 'hs2019 covering the request target and creation time, with body digests',
  allowedAlgorithms: ['hs2019'],
  requiredHeaders: ['(request-target)', '(created)'],
  maxAge: 60,
  clockSkew: 5,
  verifyDigest: true
};

/**
 * Every supported algorithm, freshness from the Date header
 */
export const LEGACY_VERIFICATION_POLICY: VerificationPolicy = {
  name: 'legacy',
  description: 'Any supported algorithm over at least the Date header',
  allowedAlgorithms: SUPPORTED_ALGORITHMS,
  requiredHeaders: ['date'],
  maxAge: 300,
  clockSkew: 30,
  verifyDigest: false
};

export const VERIFICATION_POLICIES: Record<string, VerificationPolicy> = {
  standard: STANDARD_VERIFICATION_POLICY,
  strict: STRICT_VERIFICATION_POLICY,
  legacy: LEGACY_VERIFICATION_POLICY
};

export function getVerificationPolicy(name: string): VerificationPolicy | undefined {
  return Object.prototype.hasOwnProperty.call(VERIFICATION_POLICIES, name) ? VERIFICATION_POLICIES[name] : undefined;
}

export function getAvailableVerificationPolicies(): string[] {
  return Object.keys(VERIFICATION_POLICIES);
}
