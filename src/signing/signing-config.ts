/**
 * Configuration management for request signing
 */

import {
  KeyMaterial,
  MissingRequiredOptionError,
  SignatureAlgorithm,
  SignatureOptions,
  SigningError,
  UnsupportedAlgorithmError
} from './types.js';
import { isSignatureAlgorithm } from './crypto.js';
import type { Logger } from '../utils/logger.js';

/**
 * Signer configuration: key material plus default signing options
 */
export interface SigningConfig {
  key: KeyMaterial;
  keyId: string;
  /** Options applied to every request unless overridden per call */
  defaults?: SignatureOptions;
  logger?: Logger;
}

/**
 * Named option presets
 */
export interface SigningProfile {
  name: string;
  description: string;
  options: SignatureOptions;
}

export const SIGNING_PROFILES: Record<string, SigningProfile> = {
  modern: {
    name: 'Modern',
    description: 'hs2019 over the request target and creation time',
    options: {
      algorithms: ['hs2019'],
      headers: ['(request-target)', '(created)']
    }
  },

  strict: {
    name: 'Strict',
    description: 'hs2019 with a five minute expiry',
    options: {
      algorithms: ['hs2019'],
      headers: ['(request-target)', '(created)', '(expires)'],
      expiresIn: 300
    }
  },

  legacy: {
    name: 'Legacy',
    description: 'rsa-sha256 over the request target and Date header',
    options: {
      algorithms: ['rsa-sha256'],
      headers: ['(request-target)', 'date']
    }
  }
};

/**
 * Signing configuration builder
 */
export class SigningConfigBuilder {
  private config: Partial<SigningConfig> = {};
  private options: SignatureOptions = {};

  algorithms(...algorithms: SignatureAlgorithm[]): this {
    this.options.algorithms = algorithms;
    return this;
  }

  headers(headers: string | readonly string[]): this {
    this.options.headers = headers;
    return this;
  }

  keyId(id: string): this {
    this.config.keyId = id;
    return this;
  }

  key(key: KeyMaterial): this {
    this.config.key = key;
    return this;
  }

  age(seconds: number | null): this {
    this.options.age = seconds;
    return this;
  }

  expiresIn(seconds: number | null): this {
    this.options.expiresIn = seconds;
    return this;
  }

  /**
   * Apply a named profile; options set afterwards win over it
   */
  profile(profileName: string): this {
    const profile = getProfile(profileName);
    if (!profile) {
      throw new SigningError(`Unknown signing profile: ${profileName}`, 'UNKNOWN_PROFILE', {
        availableProfiles: getAvailableProfiles()
      });
    }
    this.options = { ...this.options, ...profile.options };
    return this;
  }

  /**
   * Merge arbitrary default options
   */
  defaults(options: SignatureOptions): this {
    this.options = { ...this.options, ...options };
    return this;
  }

  logger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  build(): SigningConfig {
    const { key, keyId, logger } = this.config;
    if (key === undefined) {
      throw new MissingRequiredOptionError('key');
    }
    if (keyId === undefined) {
      throw new MissingRequiredOptionError('keyId');
    }

    const config: SigningConfig = { key, keyId, defaults: { ...this.options }, logger };
    validateSigningConfig(config);
    return config;
  }
}

export function createSigningConfig(): SigningConfigBuilder {
  return new SigningConfigBuilder();
}

/**
 * Create a signing configuration from a named profile
 */
export function createFromProfile(profileName: string, keyId: string, key: KeyMaterial): SigningConfig {
  return createSigningConfig().profile(profileName).keyId(keyId).key(key).build();
}

/**
 * Fail before any crypto work if the configuration cannot produce a signature
 */
export function validateSigningConfig(config: SigningConfig): void {
  if (config.key === undefined || config.key === null) {
    throw new MissingRequiredOptionError('key');
  }

  if (typeof config.keyId !== 'string' || config.keyId === '') {
    throw new MissingRequiredOptionError('keyId');
  }

  const algorithms = config.defaults?.algorithms;
  if (algorithms !== undefined) {
    const list = typeof algorithms === 'string' ? [algorithms] : algorithms;
    for (const algorithm of list) {
      if (!isSignatureAlgorithm(algorithm)) {
        throw new UnsupportedAlgorithmError(algorithm);
      }
    }
  }
}

export function getAvailableProfiles(): string[] {
  return Object.keys(SIGNING_PROFILES);
}

export function getProfile(name: string): SigningProfile | undefined {
  return Object.prototype.hasOwnProperty.call(SIGNING_PROFILES, name) ? SIGNING_PROFILES[name] : undefined;
}
