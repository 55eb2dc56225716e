/**
 * Utility functions for request signing
 */

/**
 * Unix timestamp (whole seconds) of the given instant
 */
export function generateTimestamp(now: Date = new Date()): number {
  return Math.floor(now.getTime() / 1000);
}

/**
 * 'created' value shifted `age` seconds into the past; '' when age is null
 */
export function createdTimestamp(age: number | null, now: Date): string {
  if (age === null) {
    return '';
  }
  return String(generateTimestamp(now) - age);
}

/**
 * 'expires' value `expiresIn` seconds in the future; '' when not set
 */
export function expiresTimestamp(expiresIn: number | null | undefined, now: Date): string {
  if (expiresIn === null || expiresIn === undefined) {
    return '';
  }
  return String(generateTimestamp(now) + expiresIn);
}

/**
 * RFC 7231 IMF-fixdate, e.g. "Thu, 15 Jan 2026 10:00:00 GMT"
 */
export function httpDate(age: number | null, now: Date): string {
  const shifted = new Date(now.getTime() - (age ?? 0) * 1000);
  return shifted.toUTCString();
}

/**
 * Value of the "(request-target)" pseudo-header
 */
export function buildRequestTarget(method: string, path: string, query = ''): string {
  const target = `${method.toLowerCase()} ${path}`;
  return query === '' ? target : `${target}?${query}`;
}

/**
 * Parse an HTTP date; returns undefined for anything Date cannot read
 */
export function parseHttpDate(value: string): Date | undefined {
  const time = Date.parse(value);
  return Number.isNaN(time) ? undefined : new Date(time);
}

/**
 * Convert bytes or a UTF-8 string to a Buffer
 */
export function toBuffer(data: string | Uint8Array): Buffer {
  return typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
}
