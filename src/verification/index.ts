/**
 * Signature verification module
 */

// Export types
export * from './types.js';

// Export policy constants
export {
  STANDARD_VERIFICATION_POLICY,
  STRICT_VERIFICATION_POLICY,
  LEGACY_VERIFICATION_POLICY,
  VERIFICATION_POLICIES,
  getVerificationPolicy,
  getAvailableVerificationPolicies
} from './policies.js';

// Export core verifier
export * from './verifier.js';
