/**
 * Signed request dispatch
 * Signs a request and hands it to a caller-supplied transport
 */

import {
  HeaderRecord,
  HttpMethod,
  KeyMaterial,
  MissingRequiredOptionError,
  SignatureOptions
} from '../signing/types.js';
import { HeaderMap } from '../signing/headers.js';
import { withSignature } from '../signing/http-signer.js';
import { Logger, defaultLogger } from '../utils/logger.js';

/**
 * Request handed to a dispatcher after signing
 */
export interface DispatchRequest<P> {
  method: HttpMethod;
  path: string;
  query: string;
  headers: HeaderMap;
  payload?: P;
}

/**
 * Performs the actual transport
 */
export type Dispatcher<P, R> = (request: DispatchRequest<P>) => R | Promise<R>;

/**
 * Signature options plus the key, keyId and base request data
 */
export interface SignedRequestOptions extends SignatureOptions {
  key?: KeyMaterial;
  keyId?: string;
  /** Query string signed as part of "(request-target)" */
  query?: string;
  /** Headers sent with the request; the signature headers are added to these */
  requestHeaders?: HeaderRecord;
  logger?: Logger;
}

/**
 * Sign and dispatch a request
 */
export async function signedRequest<P, R>(
  dispatch: Dispatcher<P, R>,
  method: HttpMethod,
  path: string,
  payload: P | undefined,
  options: SignedRequestOptions
): Promise<R> {
  const { key, keyId, query = '', requestHeaders = {}, logger = defaultLogger, ...signatureOptions } = options;

  if (key === undefined) {
    throw new MissingRequiredOptionError('key');
  }
  if (keyId === undefined) {
    throw new MissingRequiredOptionError('keyId');
  }
  if (path === '') {
    throw new MissingRequiredOptionError('path');
  }

  const signed = withSignature(
    { method, path, query, headers: new HeaderMap(requestHeaders) },
    key,
    keyId,
    signatureOptions
  );
  const headers = new HeaderMap(signed.headers);

  logger.debug('Dispatching signed request', {
    method,
    path,
    authorization: headers.get('authorization')[0]
  });

  return dispatch({ method, path, query, headers, payload });
}

export type SignedMethodHelper<P, R> = (path: string, payload: P | undefined, options: SignedRequestOptions) => Promise<R>;

export interface SignedClient<P, R> {
  get: SignedMethodHelper<P, R>;
  post: SignedMethodHelper<P, R>;
  put: SignedMethodHelper<P, R>;
  patch: SignedMethodHelper<P, R>;
  delete: SignedMethodHelper<P, R>;
  options: SignedMethodHelper<P, R>;
  connect: SignedMethodHelper<P, R>;
  trace: SignedMethodHelper<P, R>;
  head: SignedMethodHelper<P, R>;
}

/**
 * Per-method wrappers around signedRequest for one dispatcher
 */
export function createSignedClient<P, R>(dispatch: Dispatcher<P, R>): SignedClient<P, R> {
  const helper =
    (method: HttpMethod): SignedMethodHelper<P, R> =>
    (path, payload, options) =>
      signedRequest(dispatch, method, path, payload, options);

  return {
    get: helper('GET'),
    post: helper('POST'),
    put: helper('PUT'),
    patch: helper('PATCH'),
    delete: helper('DELETE'),
    options: helper('OPTIONS'),
    connect: helper('CONNECT'),
    trace: helper('TRACE'),
    head: helper('HEAD')
  };
}
