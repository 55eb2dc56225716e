/**
 * Signing string construction for draft-cavage HTTP signatures
 */

import type { HeaderSource } from './types.js';

/**
 * Values the signing string is built from
 */
export interface SigningStringContext {
  /** Value for "(request-target)" */
  requestTarget: string;
  /** Value for "(created)" */
  created: string;
  /** Value for "(expires)" */
  expires: string;
  /** Value for "date" */
  date: string;
  /** Lookup for every other header */
  headers: HeaderSource;
}

/**
 * Header list signed when the caller does not name one
 */
export function defaultHeaders(algorithm: string): string {
  return algorithm === 'hs2019' ? '(created)' : 'date';
}

/**
 * Split a wire header list on single spaces. Consecutive spaces produce
 * empty names, which the builder renders as degenerate lines.
 */
export function parseHeaderList(headers: string | readonly string[]): string[] {
  return typeof headers === 'string' ? headers.split(' ') : [...headers];
}

/**
 * Join a header list into its wire form
 */
export function formatHeaderList(headers: readonly string[]): string {
  return headers.join(' ');
}

/**
 * Signing string builder
 */
export class SigningStringBuilder {
  constructor(private readonly context: SigningStringContext) {}

  build(headerNames: readonly string[]): string {
    return headerNames.map(name => this.buildLine(name)).join('\n');
  }

  // Pseudo-headers and "date" match verbatim; anything else is a header lookup
  private buildLine(name: string): string {
    switch (name) {
      case '(request-target)':
        return `(request-target): ${this.context.requestTarget}`;
      case '(created)':
        return `(created): ${this.context.created}`;
      case '(expires)':
        return `(expires): ${this.context.expires}`;
      case 'date':
        return `date: ${this.context.date}`;
      default:
        return `${name}: ${this.context.headers.get(name).join(',')}`;
    }
  }
}

/**
 * Build the signing string for a header list
 */
export function buildSigningString(
  headerNames: string | readonly string[],
  context: SigningStringContext
): string {
  return new SigningStringBuilder(context).build(parseHeaderList(headerNames));
}

/**
 * Header list for an algorithm, falling back to its default
 */
export function resolveHeaderList(
  headers: string | readonly string[] | undefined,
  algorithm: string
): string[] {
  return parseHeaderList(headers ?? defaultHeaders(algorithm));
}
