/**
 * Request signing module
 * Implements draft-cavage HTTP Signatures with RSA, ECDSA and HMAC
 */

// Export types
export * from './types.js';

// Export utilities
export * from './utils.js';
export * from './headers.js';

// Export crypto primitives and digests
export * from './crypto.js';
export * from './digest.js';

// Export configuration
export * from './signing-config.js';

// Export signing string and parameter functions
export * from './canonical-message.js';
export * from './signature-params.js';

// Export main signer
export * from './http-signer.js';
