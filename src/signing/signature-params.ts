/**
 * Resolution and serialization of the Authorization header's signature parameters
 */

import {
  KeyMaterial,
  SignableRequest,
  SignatureAlgorithm,
  SignatureOptions,
  SignatureParameters,
  SignatureResult
} from './types.js';
import { buildSigningString, formatHeaderList, resolveHeaderList } from './canonical-message.js';
import { sign } from './crypto.js';
import { toHeaderSource } from './headers.js';
import { buildRequestTarget, createdTimestamp, expiresTimestamp, httpDate } from './utils.js';

/**
 * Wire order of the signature parameters
 */
export const PARAMETER_ORDER: readonly (keyof SignatureParameters)[] = [
  'keyId',
  'signature',
  'headers',
  'created',
  'expires',
  'algorithm'
];

const QUOTED_PARAMETERS = new Set<keyof SignatureParameters>(['keyId', 'signature', 'headers']);

export const DEFAULT_ALGORITHMS: readonly SignatureAlgorithm[] = ['hs2019'];

/**
 * Head of the configured algorithm list; the rest is informational
 */
export function signingAlgorithm(
  algorithms: SignatureAlgorithm | readonly SignatureAlgorithm[] = DEFAULT_ALGORITHMS
): SignatureAlgorithm {
  if (typeof algorithms === 'string') {
    return algorithms;
  }
  return algorithms.length > 0 ? algorithms[0] : DEFAULT_ALGORITHMS[0];
}

/**
 * Serialize parameters in wire order, dropping any that resolved to ''
 */
export function serializeSignatureParameters(params: SignatureParameters): string {
  return PARAMETER_ORDER
    .filter(name => params[name] !== '')
    .map(name => (QUOTED_PARAMETERS.has(name) ? `${name}="${params[name]}"` : `${name}=${params[name]}`))
    .join(',');
}

export function formatAuthorizationHeader(params: SignatureParameters): string {
  return `Signature ${serializeSignatureParameters(params)}`;
}

function literal(value: string | number | undefined): string | undefined {
  return value === undefined ? undefined : String(value);
}

/**
 * Resolve every parameter, sign, and build the header values. `now` is
 * sampled once so that 'created' and the Date header agree.
 */
export function resolveSignature(
  request: SignableRequest,
  key: KeyMaterial,
  keyId: string,
  options: SignatureOptions = {}
): SignatureResult {
  const now = (options.now ?? (() => new Date()))();
  const age = options.age === undefined ? 0 : options.age;

  const created = literal(options.created) ?? createdTimestamp(age, now);
  const expires = literal(options.expires) ?? expiresTimestamp(options.expiresIn, now);
  const date = options.date ?? httpDate(age, now);
  const algorithm = signingAlgorithm(options.algorithms);
  const headerNames = resolveHeaderList(options.headers, algorithm);
  const requestTarget =
    options.requestTarget ?? buildRequestTarget(request.method, request.path, request.query);

  const signingString =
    options.toBeSigned ??
    buildSigningString(headerNames, {
      requestTarget,
      created,
      expires,
      date,
      headers: toHeaderSource(request.headers)
    });

  const signature = options.signature ?? sign(signingString, algorithm, key).toString('base64');

  const parameters: SignatureParameters = {
    keyId: options.keyIdOverride ?? keyId,
    signature: options.signatureOverride ?? signature,
    headers: options.headersOverride ?? formatHeaderList(headerNames),
    created: literal(options.createdOverride) ?? created,
    expires: literal(options.expiresOverride) ?? expires,
    algorithm: options.algorithmOverride ?? algorithm
  };

  const authorization = formatAuthorizationHeader(parameters);

  return {
    authorization,
    date,
    signingString,
    parameters,
    headers: { authorization, date }
  };
}
