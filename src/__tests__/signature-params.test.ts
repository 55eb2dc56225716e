/**
 * Tests for signature parameter resolution and serialization
 */

import {
  SignableRequest,
  SignatureParameters,
  formatAuthorizationHeader,
  resolveSignature,
  serializeSignatureParameters,
  signingAlgorithm
} from '../signing';
import { FIXED_HTTP_DATE, HMAC_SECRET, fixedClock } from './fixtures/keys';

const CREATED_SIGNATURE = 'U/wVxY17yutt+C/py5T1gyqRtc9c6QsHGQiUu6qjKpc=';

describe('Signature parameters', () => {
  const request: SignableRequest = { method: 'GET', path: '/foo', headers: {} };
  const hmacOptions = { algorithms: 'hmac-sha256', headers: '(created)', now: fixedClock } as const;

  describe('serializeSignatureParameters', () => {
    const params: SignatureParameters = {
      keyId: 'k1',
      signature: 'c2ln',
      headers: '(created) date',
      created: '100',
      expires: '200',
      algorithm: 'hs2019'
    };

    it('should write parameters in wire order with quoting', () => {
      expect(serializeSignatureParameters(params)).toBe(
        'keyId="k1",signature="c2ln",headers="(created) date",created=100,expires=200,algorithm=hs2019'
      );
    });

    it('should drop parameters whose value is empty', () => {
      expect(serializeSignatureParameters({ ...params, created: '', expires: '' })).toBe(
        'keyId="k1",signature="c2ln",headers="(created) date",algorithm=hs2019'
      );
      expect(serializeSignatureParameters({ ...params, keyId: '', algorithm: '' })).toBe(
        'signature="c2ln",headers="(created) date",created=100,expires=200'
      );
    });

    it('should prefix the Signature scheme', () => {
      expect(formatAuthorizationHeader({ ...params, headers: '', created: '', expires: '', algorithm: '' })).toBe(
        'Signature keyId="k1",signature="c2ln"'
      );
    });
  });

  describe('signingAlgorithm', () => {
    it('should use the head of the list', () => {
      expect(signingAlgorithm(['rsa-sha256', 'hs2019'])).toBe('rsa-sha256');
      expect(signingAlgorithm('ecdsa-sha256')).toBe('ecdsa-sha256');
      expect(signingAlgorithm([])).toBe('hs2019');
      expect(signingAlgorithm()).toBe('hs2019');
    });
  });

  describe('resolveSignature', () => {
    it('should sign the created pseudo-header with HMAC', () => {
      const result = resolveSignature(request, HMAC_SECRET, 'test-key', hmacOptions);

      expect(result.signingString).toBe('(created): 1768471200');
      expect(result.date).toBe(FIXED_HTTP_DATE);
      expect(result.authorization).toBe(
        `Signature keyId="test-key",signature="${CREATED_SIGNATURE}",headers="(created)",created=1768471200,algorithm=hmac-sha256`
      );
      expect(result.headers).toEqual({ authorization: result.authorization, date: FIXED_HTTP_DATE });
    });

    it('should cover the request target, expiry and digest', () => {
      const result = resolveSignature(
        {
          method: 'POST',
          path: '/items',
          query: 'x=1',
          headers: { Digest: 'SHA-256=LPJNul+wow4m6DsqxbninhsWHlwfp0JecwQzYpOLmCQ=' }
        },
        HMAC_SECRET,
        'test-key',
        { ...hmacOptions, headers: '(request-target) (created) (expires) digest', expiresIn: 300 }
      );

      expect(result.signingString).toBe(
        [
          '(request-target): post /items?x=1',
          '(created): 1768471200',
          '(expires): 1768471500',
          'digest: SHA-256=LPJNul+wow4m6DsqxbninhsWHlwfp0JecwQzYpOLmCQ='
        ].join('\n')
      );
      expect(result.authorization).toBe(
        'Signature keyId="test-key",signature="rNn4RrsVITDq2RmquizHYUoIv5SvhmxW/FPivY796Cw=",' +
          'headers="(request-target) (created) (expires) digest",created=1768471200,expires=1768471500,algorithm=hmac-sha256'
      );
    });

    it('should omit created when age is null', () => {
      const result = resolveSignature(request, HMAC_SECRET, 'test-key', { ...hmacOptions, headers: 'date', age: null });

      expect(result.signingString).toBe(`date: ${FIXED_HTTP_DATE}`);
      expect(result.parameters.created).toBe('');
      expect(result.authorization).toBe(
        'Signature keyId="test-key",signature="QOJOSk2xfsO8EqqV/eOrhWeWuwx7kAOtcXGKw7RrD2M=",headers="date",algorithm=hmac-sha256'
      );
    });

    it('should shift created and the Date header by age', () => {
      const result = resolveSignature(request, HMAC_SECRET, 'test-key', { ...hmacOptions, age: 30 });

      expect(result.parameters.created).toBe('1768471170');
      expect(result.date).toBe('Thu, 15 Jan 2026 09:59:30 GMT');
    });

    it('should take literal created, expires and date values', () => {
      const result = resolveSignature(request, HMAC_SECRET, 'test-key', {
        ...hmacOptions,
        headers: '(created) (expires) date',
        created: 5,
        expires: '',
        date: 'yesterday'
      });

      expect(result.signingString).toBe('(created): 5\n(expires): \ndate: yesterday');
      expect(result.parameters.created).toBe('5');
      expect(result.parameters.expires).toBe('');
      expect(result.date).toBe('yesterday');
    });

    it('should sign a replacement signing string', () => {
      const result = resolveSignature(request, HMAC_SECRET, 'test-key', { ...hmacOptions, toBeSigned: 'custom' });

      expect(result.signingString).toBe('custom');
      expect(result.parameters.signature).toBe('1HX/P234fX0WfLNv5N5ns9tz+NYyGT1iWH5ppOLXS3w=');
      expect(result.parameters.headers).toBe('(created)');
    });

    it('should use a supplied signature without signing', () => {
      const result = resolveSignature(request, 'not a key', 'test-key', {
        ...hmacOptions,
        algorithms: 'rsa-sha256',
        signature: 'AAAA'
      });

      expect(result.parameters.signature).toBe('AAAA');
      expect(result.parameters.algorithm).toBe('rsa-sha256');
    });

    it('should replace the request target', () => {
      const result = resolveSignature(request, HMAC_SECRET, 'test-key', {
        ...hmacOptions,
        headers: '(request-target)',
        requestTarget: 'patch /elsewhere'
      });

      expect(result.signingString).toBe('(request-target): patch /elsewhere');
    });
  });

  describe('overrides', () => {
    it('should change only the serialized parameter', () => {
      const result = resolveSignature(request, HMAC_SECRET, 'test-key', {
        ...hmacOptions,
        keyIdOverride: 'other-key',
        createdOverride: 42,
        expiresOverride: 99,
        headersOverride: 'date',
        algorithmOverride: 'hs2019'
      });

      expect(result.signingString).toBe('(created): 1768471200');
      expect(result.authorization).toBe(
        `Signature keyId="other-key",signature="${CREATED_SIGNATURE}",headers="date",created=42,expires=99,algorithm=hs2019`
      );
    });

    it('should replace the signature after signing', () => {
      const result = resolveSignature(request, HMAC_SECRET, 'test-key', { ...hmacOptions, signatureOverride: 'forged' });

      expect(result.parameters.signature).toBe('forged');
      expect(result.signingString).toBe('(created): 1768471200');
    });

    it('should drop a parameter overridden with an empty string', () => {
      const result = resolveSignature(request, HMAC_SECRET, 'test-key', {
        ...hmacOptions,
        keyIdOverride: '',
        algorithmOverride: '',
        createdOverride: ''
      });

      expect(result.authorization).toBe(`Signature signature="${CREATED_SIGNATURE}",headers="(created)"`);
    });
  });
});
