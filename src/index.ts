/**
 * http-message-signer
 * draft-cavage HTTP Signatures: signing, digests, verification and signed dispatch
 */

// Export request signing functionality
export * from './signing/index.js';

// Export signature verification functionality
export * from './verification/index.js';

// Export signed dispatch helpers
export * from './server/index.js';

// Export configuration
export {
  UnifiedConfigManager,
  UnifiedConfigError,
  createUnifiedConfig,
  loadUnifiedConfigFromJSON,
  loadUnifiedConfigFromFile
} from './config/unified-config.js';
export type {
  UnifiedConfig,
  EnvironmentConfig,
  UnifiedSigningConfig,
  UnifiedVerificationConfig,
  LoggingConfig
} from './config/unified-config.js';

// Export logging
export { createConsoleLogger, defaultLogger, isLogLevel } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
