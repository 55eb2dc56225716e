/**
 * Case-insensitive, multi-valued header collection
 */

import type { HeaderRecord, HeaderSink, HeaderSource } from './types.js';

export class HeaderMap implements HeaderSource, HeaderSink {
  private entries = new Map<string, string[]>();
  private fallback?: HeaderSource;

  /**
   * Copies a HeaderMap or a plain record. Any other HeaderSource is kept as a
   * read-through fallback for names this map has not set itself.
   */
  constructor(init?: HeaderSource | HeaderRecord) {
    if (init instanceof HeaderMap) {
      this.fallback = init.fallback;
      for (const [name, values] of init.entries) {
        this.entries.set(name, [...values]);
      }
    } else if (init && isHeaderSource(init)) {
      this.fallback = init;
    } else if (init) {
      for (const [name, value] of Object.entries(init)) {
        const values = typeof value === 'string' ? [value] : value;
        for (const v of values) {
          this.append(name, v);
        }
      }
    }
  }

  get(name: string): readonly string[] {
    const own = this.entries.get(name.toLowerCase());
    if (own) {
      return own;
    }
    return this.fallback ? this.fallback.get(name) : [];
  }

  has(name: string): boolean {
    return this.get(name).length > 0;
  }

  /**
   * Replace all values of a header
   */
  set(name: string, value: string): void {
    this.entries.set(name.toLowerCase(), [value]);
  }

  append(name: string, value: string): void {
    const key = name.toLowerCase();
    const existing = this.entries.get(key) ?? [...(this.fallback?.get(key) ?? [])];
    existing.push(value);
    this.entries.set(key, existing);
  }

  /**
   * Names set on this map (a read-through fallback cannot be enumerated)
   */
  names(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Flatten to a record, joining repeated values with ', '
   */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [name, values] of this.entries) {
      record[name] = values.join(', ');
    }
    return record;
  }
}

export function isHeaderSource(value: HeaderSource | HeaderRecord): value is HeaderSource {
  return typeof value.get === 'function';
}

/**
 * Wrap whatever the caller passed as headers in a HeaderSource
 */
export function toHeaderSource(headers: HeaderSource | HeaderRecord): HeaderSource {
  return isHeaderSource(headers) ? headers : new HeaderMap(headers);
}
