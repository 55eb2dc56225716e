/**
 * Unified configuration management
 *
 * Loads per-environment signing, verification and logging settings from a
 * JSON document and converts them into signer options and verification
 * policies.
 */

import { readFileSync } from 'node:fs';
import type { SignatureOptions } from '../signing/types.js';
import { isSignatureAlgorithm } from '../signing/crypto.js';
import { isDigestAlgorithm } from '../signing/digest.js';
import type { VerificationPolicy } from '../verification/types.js';
import { getVerificationPolicy } from '../verification/policies.js';
import { LogLevel, Logger, createConsoleLogger, isLogLevel } from '../utils/logger.js';

/**
 * Unified configuration structure
 */
export interface UnifiedConfig {
  config_format_version: string;
  environments: Record<string, EnvironmentConfig>;
  defaults: DefaultConfig;
}

/**
 * Environment-specific configuration
 */
export interface EnvironmentConfig {
  signing: UnifiedSigningConfig;
  verification: UnifiedVerificationConfig;
  logging: LoggingConfig;
}

export interface UnifiedSigningConfig {
  algorithms: string[];
  headers: string[];
  age: number | null;
  expires_in: number | null;
  digest_algorithms: string[];
}

export interface UnifiedVerificationConfig {
  /** Built-in policy the settings below refine */
  policy: string;
  max_age_seconds?: number;
  clock_skew_seconds?: number;
  required_headers?: string[];
  verify_digest?: boolean;
}

export interface LoggingConfig {
  level: string;
  log_signing_strings: boolean;
}

export interface DefaultConfig {
  environment: string;
}

/**
 * Configuration loading error
 */
export class UnifiedConfigError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'UnifiedConfigError';
  }
}

/**
 * Unified configuration manager
 */
export class UnifiedConfigManager {
  private config: UnifiedConfig;
  private currentEnvironment: string;

  constructor(config: UnifiedConfig, environment?: string) {
    validateStructure(config);
    this.config = config;
    this.currentEnvironment = environment || config.defaults.environment;
    this.validate();
  }

  /**
   * Load unified configuration from JSON string
   */
  static fromJSON(jsonString: string, environment?: string): UnifiedConfigManager {
    let parsed: UnifiedConfig;
    try {
      parsed = JSON.parse(jsonString);
    } catch (error) {
      throw new UnifiedConfigError(
        `Failed to parse configuration JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
        'PARSE_ERROR'
      );
    }
    return new UnifiedConfigManager(parsed, environment);
  }

  /**
   * Load unified configuration from a file
   */
  static fromFile(path: string, environment?: string): UnifiedConfigManager {
    let contents: string;
    try {
      contents = readFileSync(path, 'utf8');
    } catch (error) {
      throw new UnifiedConfigError(
        `Failed to read configuration file ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        'LOAD_ERROR'
      );
    }
    return UnifiedConfigManager.fromJSON(contents, environment);
  }

  setEnvironment(environment: string): void {
    if (!this.hasEnvironment(environment)) {
      throw new UnifiedConfigError(`Environment '${environment}' not found`, 'ENVIRONMENT_NOT_FOUND');
    }
    this.currentEnvironment = environment;
  }

  getCurrentEnvironment(): string {
    return this.currentEnvironment;
  }

  getCurrentEnvironmentConfig(): EnvironmentConfig {
    if (!this.hasEnvironment(this.currentEnvironment)) {
      throw new UnifiedConfigError(`Environment '${this.currentEnvironment}' not found`, 'ENVIRONMENT_NOT_FOUND');
    }
    return this.config.environments[this.currentEnvironment];
  }

  listEnvironments(): string[] {
    return Object.keys(this.config.environments);
  }

  /**
   * Default signing options for the current environment
   */
  toSignatureOptions(): SignatureOptions {
    const { signing } = this.getCurrentEnvironmentConfig();
    return {
      algorithms: signing.algorithms.filter(isSignatureAlgorithm),
      headers: [...signing.headers],
      age: signing.age,
      expiresIn: signing.expires_in
    };
  }

  /**
   * Digest algorithms to use for request bodies
   */
  getDigestAlgorithms(): string[] {
    return [...this.getCurrentEnvironmentConfig().signing.digest_algorithms];
  }

  /**
   * Built-in policy refined by the environment's verification settings
   */
  toVerificationPolicy(): VerificationPolicy {
    const { verification } = this.getCurrentEnvironmentConfig();
    const base = getVerificationPolicy(verification.policy);
    if (!base) {
      throw new UnifiedConfigError(
        `Unknown verification policy '${verification.policy}'`,
        'INVALID_VERIFICATION_POLICY'
      );
    }
    return {
      ...base,
      maxAge: verification.max_age_seconds ?? base.maxAge,
      clockSkew: verification.clock_skew_seconds ?? base.clockSkew,
      requiredHeaders: verification.required_headers ?? base.requiredHeaders,
      verifyDigest: verification.verify_digest ?? base.verifyDigest
    };
  }

  getLoggingConfig(): LoggingConfig {
    return this.getCurrentEnvironmentConfig().logging;
  }

  /**
   * Console logger at the configured level. Signing strings are only logged
   * at debug level, so log_signing_strings=false caps the level at info.
   */
  createLogger(): Logger {
    const logging = this.getLoggingConfig();
    let level: LogLevel = isLogLevel(logging.level) ? logging.level : 'warn';
    if (level === 'debug' && !logging.log_signing_strings) {
      level = 'info';
    }
    return createConsoleLogger(level);
  }

  getConfig(): UnifiedConfig {
    return this.config;
  }

  private hasEnvironment(environment: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.config.environments, environment);
  }

  private validate(): void {
    if (!this.hasEnvironment(this.currentEnvironment)) {
      throw new UnifiedConfigError(
        `Environment '${this.currentEnvironment}' not found`,
        'ENVIRONMENT_NOT_FOUND'
      );
    }

    for (const [envName, envConfig] of Object.entries(this.config.environments)) {
      const { signing, verification, logging } = envConfig;

      const algorithms = signing.algorithms;
      if (!Array.isArray(algorithms) || algorithms.length === 0) {
        throw new UnifiedConfigError(`Environment '${envName}' lists no signing algorithms`, 'INVALID_SIGNING_CONFIG');
      }
      const unknown = algorithms.find(algorithm => !isSignatureAlgorithm(algorithm));
      if (unknown !== undefined) {
        throw new UnifiedConfigError(
          `Environment '${envName}' uses unsupported algorithm '${unknown}'`,
          'INVALID_SIGNING_CONFIG'
        );
      }

      const digestAlgorithms = signing.digest_algorithms ?? [];
      if (!Array.isArray(digestAlgorithms)) {
        throw new UnifiedConfigError(
          `Environment '${envName}' digest_algorithms must be a list`,
          'INVALID_SIGNING_CONFIG'
        );
      }
      const unknownDigest = digestAlgorithms.find(algorithm => !isDigestAlgorithm(algorithm));
      if (unknownDigest !== undefined) {
        throw new UnifiedConfigError(
          `Environment '${envName}' uses unsupported digest algorithm '${unknownDigest}'`,
          'INVALID_SIGNING_CONFIG'
        );
      }

      if (!getVerificationPolicy(verification.policy)) {
        throw new UnifiedConfigError(
          `Environment '${envName}' references unknown verification policy '${verification.policy}'`,
          'INVALID_VERIFICATION_POLICY'
        );
      }

      if (!isLogLevel(logging.level)) {
        throw new UnifiedConfigError(
          `Environment '${envName}' has invalid logging level '${logging.level}'`,
          'INVALID_LOGGING_CONFIG'
        );
      }
    }
  }
}

function isObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shape checks that must pass before any field is read
 */
function validateStructure(config: UnifiedConfig): void {
  if (!isObject(config)) {
    throw new UnifiedConfigError('Configuration must be an object', 'INVALID_CONFIG');
  }

  if (!isObject(config.defaults) || typeof config.defaults.environment !== 'string') {
    throw new UnifiedConfigError('Configuration has no default environment', 'INVALID_CONFIG');
  }

  if (!isObject(config.environments)) {
    throw new UnifiedConfigError('Configuration has no environments', 'INVALID_CONFIG');
  }

  for (const [envName, envConfig] of Object.entries(config.environments)) {
    if (!isObject(envConfig)) {
      throw new UnifiedConfigError(`Environment '${envName}' must be an object`, 'INVALID_CONFIG');
    }
    for (const section of ['signing', 'verification', 'logging'] as const) {
      if (!isObject(envConfig[section])) {
        throw new UnifiedConfigError(`Environment '${envName}' has no '${section}' section`, 'INVALID_CONFIG');
      }
    }
  }
}

export function createUnifiedConfig(config: UnifiedConfig, environment?: string): UnifiedConfigManager {
  return new UnifiedConfigManager(config, environment);
}

export function loadUnifiedConfigFromJSON(jsonString: string, environment?: string): UnifiedConfigManager {
  return UnifiedConfigManager.fromJSON(jsonString, environment);
}

export function loadUnifiedConfigFromFile(path: string, environment?: string): UnifiedConfigManager {
  return UnifiedConfigManager.fromFile(path, environment);
}

