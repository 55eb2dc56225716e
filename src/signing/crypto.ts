/**
 * Signature primitives for the supported HTTP signature algorithms
 */

import {
  KeyObject,
  createHmac,
  createPrivateKey,
  createPublicKey,
  sign as signWithKey,
  timingSafeEqual,
  verify as verifyWithKey
} from 'node:crypto';
import {
  KeyMaterial,
  KeyMismatchError,
  SignatureAlgorithm,
  UnsupportedAlgorithmError
} from './types.js';
import { toBuffer } from './utils.js';

type KeyKind = 'rsa' | 'ec' | 'hmac';

interface Primitive {
  kind: KeyKind;
  hash: 'sha1' | 'sha256';
}

/**
 * hs2019 is always signed with RSA-SHA256; the 'algorithm' parameter still
 * reads "hs2019".
 */
const PRIMITIVES: Record<SignatureAlgorithm, Primitive> = {
  hs2019: { kind: 'rsa', hash: 'sha256' },
  'rsa-sha256': { kind: 'rsa', hash: 'sha256' },
  'rsa-sha1': { kind: 'rsa', hash: 'sha1' },
  'ecdsa-sha256': { kind: 'ec', hash: 'sha256' },
  'hmac-sha256': { kind: 'hmac', hash: 'sha256' }
};

export const SUPPORTED_ALGORITHMS: readonly SignatureAlgorithm[] = [
  'hs2019',
  'rsa-sha256',
  'rsa-sha1',
  'ecdsa-sha256',
  'hmac-sha256'
];

export function isSignatureAlgorithm(value: string): value is SignatureAlgorithm {
  return Object.prototype.hasOwnProperty.call(PRIMITIVES, value);
}

function primitiveFor(algorithm: string): Primitive {
  if (!isSignatureAlgorithm(algorithm)) {
    throw new UnsupportedAlgorithmError(algorithm);
  }
  return PRIMITIVES[algorithm];
}

/**
 * Sign a message. Returns the raw signature (DER for ECDSA, MAC bytes for HMAC).
 */
export function sign(message: string | Uint8Array, algorithm: string, key: KeyMaterial): Buffer {
  const primitive = primitiveFor(algorithm);
  const data = toBuffer(message);

  if (primitive.kind === 'hmac') {
    return hmac(data, primitive, resolveSecret(key, algorithm));
  }

  const privateKey = resolvePrivateKey(key, primitive.kind, algorithm);
  return signWithKey(primitive.hash, data, { key: privateKey, dsaEncoding: 'der' });
}

/**
 * Verify a raw signature. A private key is accepted for RSA and EC and its
 * public half is used. Never throws on a bad signature.
 */
export function verify(
  message: string | Uint8Array,
  signature: Uint8Array,
  algorithm: string,
  key: KeyMaterial
): boolean {
  const primitive = primitiveFor(algorithm);
  const data = toBuffer(message);

  if (primitive.kind === 'hmac') {
    const expected = hmac(data, primitive, resolveSecret(key, algorithm));
    const presented = Buffer.from(signature);
    return expected.length === presented.length && timingSafeEqual(expected, presented);
  }

  const publicKey = resolvePublicKey(key, primitive.kind, algorithm);
  try {
    return verifyWithKey(primitive.hash, data, { key: publicKey, dsaEncoding: 'der' }, signature);
  } catch {
    // Malformed DER and similar decoding failures
    return false;
  }
}

function hmac(data: Buffer, primitive: Primitive, secret: KeyObject | Buffer): Buffer {
  return createHmac(primitive.hash, secret).update(data).digest();
}

function resolveSecret(key: KeyMaterial, algorithm: string): KeyObject | Buffer {
  if (key instanceof KeyObject) {
    if (key.type !== 'secret') {
      throw new KeyMismatchError(`${algorithm} requires a shared secret, got a ${key.type} key`, algorithm);
    }
    return key;
  }
  return toBuffer(key);
}

function resolvePrivateKey(key: KeyMaterial, kind: KeyKind, algorithm: string): KeyObject {
  let keyObject: KeyObject;
  if (key instanceof KeyObject) {
    keyObject = key;
  } else {
    try {
      keyObject = createPrivateKey(typeof key === 'string' ? key : Buffer.from(key));
    } catch (error) {
      throw new KeyMismatchError(
        `${algorithm} requires a private key: ${error instanceof Error ? error.message : 'unreadable key'}`,
        algorithm
      );
    }
  }

  if (keyObject.type !== 'private') {
    throw new KeyMismatchError(`${algorithm} signing requires a private key, got a ${keyObject.type} key`, algorithm);
  }
  assertKeyKind(keyObject, kind, algorithm);
  return keyObject;
}

function resolvePublicKey(key: KeyMaterial, kind: KeyKind, algorithm: string): KeyObject {
  let keyObject: KeyObject;
  try {
    if (key instanceof KeyObject) {
      if (key.type === 'secret') {
        throw new KeyMismatchError(`${algorithm} requires an asymmetric key, got a shared secret`, algorithm);
      }
      keyObject = key.type === 'public' ? key : createPublicKey(key);
    } else {
      keyObject = createPublicKey(typeof key === 'string' ? key : Buffer.from(key));
    }
  } catch (error) {
    if (error instanceof KeyMismatchError) {
      throw error;
    }
    throw new KeyMismatchError(
      `${algorithm} requires a public or private key: ${error instanceof Error ? error.message : 'unreadable key'}`,
      algorithm
    );
  }

  assertKeyKind(keyObject, kind, algorithm);
  return keyObject;
}

function assertKeyKind(key: KeyObject, kind: KeyKind, algorithm: string): void {
  if (key.asymmetricKeyType !== kind) {
    throw new KeyMismatchError(
      `${algorithm} requires an ${kind.toUpperCase()} key, got ${key.asymmetricKeyType ?? 'an unknown key type'}`,
      algorithm
    );
  }
}
