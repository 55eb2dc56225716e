/**
 * Tests for unified configuration loading
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import {
  STRICT_VERIFICATION_POLICY,
  UnifiedConfig,
  UnifiedConfigError,
  UnifiedConfigManager,
  createSigner,
  createUnifiedConfig,
  createVerifier,
  digest,
  loadUnifiedConfigFromFile,
  loadUnifiedConfigFromJSON
} from '../index';
import { fixedClock, generateRsaKeyPair } from './fixtures/keys';

const CONFIG_PATH = path.join(__dirname, '../../config/http-signatures.json');

function loadConfig(): UnifiedConfig {
  return JSON.parse(readFileSync(CONFIG_PATH, 'utf8'));
}

function configError(build: () => unknown): UnifiedConfigError | undefined {
  try {
    build();
  } catch (error) {
    if (error instanceof UnifiedConfigError) {
      return error;
    }
    throw error;
  }
  return undefined;
}

describe('UnifiedConfigManager', () => {
  describe('loading', () => {
    it('should load the bundled configuration with its default environment', () => {
      const manager = loadUnifiedConfigFromFile(CONFIG_PATH);

      expect(manager.getCurrentEnvironment()).toBe('development');
      expect(manager.listEnvironments()).toEqual(['development', 'production', 'legacy']);
      expect(manager.getConfig().config_format_version).toBe('1.0');
    });

    it('should load from a JSON string in a chosen environment', () => {
      const manager = loadUnifiedConfigFromJSON(JSON.stringify(loadConfig()), 'legacy');

      expect(manager.getCurrentEnvironment()).toBe('legacy');
    });

    it('should report unparseable JSON', () => {
      expect(configError(() => UnifiedConfigManager.fromJSON('{ not json'))?.code).toBe('PARSE_ERROR');
    });

    it('should report an unreadable file', () => {
      expect(configError(() => UnifiedConfigManager.fromFile(path.join(__dirname, 'missing.json')))?.code).toBe(
        'LOAD_ERROR'
      );
    });
  });

  describe('environments', () => {
    it('should switch environments', () => {
      const manager = createUnifiedConfig(loadConfig());
      manager.setEnvironment('production');

      expect(manager.getCurrentEnvironment()).toBe('production');
      expect(manager.getCurrentEnvironmentConfig().logging.level).toBe('warn');
    });

    it('should reject unknown environments', () => {
      const manager = createUnifiedConfig(loadConfig());

      expect(configError(() => manager.setEnvironment('staging'))?.code).toBe('ENVIRONMENT_NOT_FOUND');
      expect(configError(() => createUnifiedConfig(loadConfig(), 'staging'))?.code).toBe('ENVIRONMENT_NOT_FOUND');
      expect(manager.getCurrentEnvironment()).toBe('development');
    });
  });

  describe('signing settings', () => {
    it('should convert to signature options', () => {
      expect(createUnifiedConfig(loadConfig()).toSignatureOptions()).toEqual({
        algorithms: ['hs2019'],
        headers: ['(request-target)', '(created)'],
        age: 0,
        expiresIn: null
      });
      expect(createUnifiedConfig(loadConfig(), 'legacy').toSignatureOptions()).toEqual({
        algorithms: ['rsa-sha256'],
        headers: ['(request-target)', 'date'],
        age: null,
        expiresIn: null
      });
    });

    it('should list digest algorithms', () => {
      expect(createUnifiedConfig(loadConfig(), 'production').getDigestAlgorithms()).toEqual(['SHA-256', 'SHA-512']);
    });
  });

  describe('verification settings', () => {
    it('should refine the named policy', () => {
      expect(createUnifiedConfig(loadConfig(), 'production').toVerificationPolicy()).toEqual({
        ...STRICT_VERIFICATION_POLICY,
        requiredHeaders: ['(request-target)', '(created)', 'digest']
      });
    });

    it('should override only the fields that are set', () => {
      const policy = createUnifiedConfig(loadConfig()).toVerificationPolicy();

      expect(policy.name).toBe('standard');
      expect(policy.maxAge).toBe(900);
      expect(policy.clockSkew).toBe(30);
      expect(policy.requiredHeaders).toEqual([]);
      expect(policy.verifyDigest).toBe(false);
    });
  });

  describe('logging', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should log debug output when signing strings are enabled', () => {
      const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);

      createUnifiedConfig(loadConfig()).createLogger().debug('Request signed', { keyId: 'k' });

      expect(debug).toHaveBeenCalledWith('Request signed', { keyId: 'k' });
    });

    it('should cap debug at info when signing strings are disabled', () => {
      const config = loadConfig();
      config.environments.development.logging.log_signing_strings = false;
      const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
      const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);

      const logger = createUnifiedConfig(config).createLogger();
      logger.debug('hidden');
      logger.info('shown');

      expect(debug).not.toHaveBeenCalled();
      expect(info).toHaveBeenCalledWith('shown', {});
    });

    it('should respect the configured level', () => {
      const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

      const logger = createUnifiedConfig(loadConfig(), 'production').createLogger();
      logger.info('hidden');
      logger.warn('shown');

      expect(info).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith('shown', {});
    });
  });

  describe('validation', () => {
    it('should require environments', () => {
      expect(configError(() => loadUnifiedConfigFromJSON('{"defaults":{"environment":"development"}}'))?.code).toBe(
        'INVALID_CONFIG'
      );
    });

    it('should require a default environment', () => {
      const error = configError(() => loadUnifiedConfigFromJSON('{"environments":{}}'));

      expect(error?.code).toBe('INVALID_CONFIG');
      expect(error?.message).toBe('Configuration has no default environment');
    });

    it('should reject documents that are not objects', () => {
      expect(configError(() => loadUnifiedConfigFromJSON('null'))?.code).toBe('INVALID_CONFIG');
      expect(configError(() => loadUnifiedConfigFromJSON('[]'))?.code).toBe('INVALID_CONFIG');
    });

    it('should require every section of an environment', () => {
      const error = configError(() =>
        loadUnifiedConfigFromJSON('{"defaults":{"environment":"d"},"environments":{"d":{}}}')
      );

      expect(error?.code).toBe('INVALID_CONFIG');
      expect(error?.message).toBe("Environment 'd' has no 'signing' section");
    });

    it('should reject a signing section without an algorithm list', () => {
      const config = loadConfig();
      const json = JSON.stringify(config).replace('"algorithms":["rsa-sha256"]', '"algorithms":"rsa-sha256"');

      expect(configError(() => loadUnifiedConfigFromJSON(json))?.code).toBe('INVALID_SIGNING_CONFIG');
    });

    it('should not accept inherited names as environments', () => {
      const manager = createUnifiedConfig(loadConfig());

      expect(configError(() => manager.setEnvironment('constructor'))?.code).toBe('ENVIRONMENT_NOT_FOUND');
      expect(configError(() => createUnifiedConfig(loadConfig(), 'toString'))?.code).toBe('ENVIRONMENT_NOT_FOUND');
    });

    it('should reject unsupported signing algorithms', () => {
      const config = loadConfig();
      config.environments.legacy.signing.algorithms = ['rsa-sha512'];

      const error = configError(() => createUnifiedConfig(config));
      expect(error?.code).toBe('INVALID_SIGNING_CONFIG');
      expect(error?.message).toBe("Environment 'legacy' uses unsupported algorithm 'rsa-sha512'");
    });

    it('should reject an empty algorithm list', () => {
      const config = loadConfig();
      config.environments.production.signing.algorithms = [];

      expect(configError(() => createUnifiedConfig(config))?.code).toBe('INVALID_SIGNING_CONFIG');
    });

    it('should reject unsupported digest algorithms', () => {
      const config = loadConfig();
      config.environments.production.signing.digest_algorithms = ['MD5'];

      expect(configError(() => createUnifiedConfig(config))?.message).toBe(
        "Environment 'production' uses unsupported digest algorithm 'MD5'"
      );
    });

    it('should reject unknown verification policies', () => {
      const config = loadConfig();
      config.environments.development.verification.policy = 'lenient';

      expect(configError(() => createUnifiedConfig(config))?.code).toBe('INVALID_VERIFICATION_POLICY');
    });

    it.each([['constructor'], ['toString']])('should not accept %p as a verification policy', policy => {
      const config = loadConfig();
      config.environments.development.verification.policy = policy;

      expect(configError(() => createUnifiedConfig(config))?.code).toBe('INVALID_VERIFICATION_POLICY');
    });

    it('should reject unknown logging levels', () => {
      const config = loadConfig();
      config.environments.legacy.logging.level = 'verbose';

      expect(configError(() => createUnifiedConfig(config))?.code).toBe('INVALID_LOGGING_CONFIG');
    });
  });

  it('should produce settings a signer and verifier agree on', () => {
    const rsa = generateRsaKeyPair();
    const manager = createUnifiedConfig(loadConfig(), 'production');
    const signer = createSigner({
      key: rsa.privateKey,
      keyId: 'rsa-key',
      defaults: { ...manager.toSignatureOptions(), now: fixedClock },
      logger: manager.createLogger()
    });
    const verifier = createVerifier({
      keys: { 'rsa-key': rsa.publicKey },
      policy: manager.toVerificationPolicy(),
      now: fixedClock
    });

    const request = signer.apply({
      method: 'POST',
      path: '/items',
      headers: { digest: digest('hello', manager.getDigestAlgorithms()) },
      body: 'hello'
    });

    expect(verifier.verify(request)).toEqual({
      valid: true,
      status: 'valid',
      keyId: 'rsa-key',
      algorithm: 'hs2019',
      headers: ['(request-target)', '(created)', '(expires)', 'digest']
    });
    expect(verifier.verify({ ...request, body: 'goodbye' }).error?.code).toBe('INVALID_DIGEST');
  });
});
