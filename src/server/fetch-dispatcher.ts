/**
 * Dispatcher that sends signed requests with fetch
 */

import type { DispatchRequest, Dispatcher } from './signed-request.js';

/**
 * Payload accepted by the fetch dispatcher: a raw body, or an object sent as JSON
 */
export type FetchPayload = string | Uint8Array | Record<string, unknown>;

export interface FetchDispatcherConfig {
  /** Origin (and optional path prefix) requests are sent to */
  baseUrl: string;
  /** fetch implementation; defaults to the global one */
  fetch?: typeof fetch;
}

/**
 * Build the URL for a dispatched request
 */
export function buildRequestUrl(baseUrl: string, path: string, query: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  return query === '' ? `${base}${path}` : `${base}${path}?${query}`;
}

export function createFetchDispatcher(config: FetchDispatcherConfig): Dispatcher<FetchPayload, Response> {
  const fetchImpl = config.fetch ?? fetch;

  return async (request: DispatchRequest<FetchPayload>): Promise<Response> => {
    const headers = request.headers.toRecord();
    let body: string | Uint8Array | undefined;

    if (typeof request.payload === 'string' || request.payload instanceof Uint8Array) {
      body = request.payload;
    } else if (request.payload !== undefined) {
      body = JSON.stringify(request.payload);
      if (!('content-type' in headers)) {
        headers['content-type'] = 'application/json';
      }
    }

    return fetchImpl(buildRequestUrl(config.baseUrl, request.path, request.query), {
      method: request.method,
      headers,
      body
    });
  };
}
