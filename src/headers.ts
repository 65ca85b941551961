/**
 * Case-insensitive header map and the inbound header sanitizer.
 * @packageDocumentation
 */

import type * as http from 'node:http';

export type Dialect = 'openai' | 'anthropic';

interface HeaderEntry {
  name: string;
  values: string[];
}

/**
 * Header mapping keyed case-insensitively. The first spelling seen for a
 * name is kept for output; values for a name may repeat.
 */
export class HeaderMap {
  private readonly entries = new Map<string, HeaderEntry>();

  static fromIncoming(headers: http.IncomingHttpHeaders): HeaderMap {
    const map = new HeaderMap();
    for (const [name, value] of Object.entries(headers)) {
      if (value === undefined) continue;
      for (const v of Array.isArray(value) ? value : [value]) {
        map.append(name, v);
      }
    }
    return map;
  }

  static from(init: Record<string, string | string[]>): HeaderMap {
    const map = new HeaderMap();
    for (const [name, value] of Object.entries(init)) {
      for (const v of Array.isArray(value) ? value : [value]) {
        map.append(name, v);
      }
    }
    return map;
  }

  get(name: string): string | undefined {
    const entry = this.entries.get(name.toLowerCase());
    return entry ? entry.values.join(', ') : undefined;
  }

  getAll(name: string): string[] {
    return [...(this.entries.get(name.toLowerCase())?.values ?? [])];
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  set(name: string, value: string): void {
    const key = name.toLowerCase();
    const existing = this.entries.get(key);
    this.entries.set(key, { name: existing?.name ?? name, values: [value] });
  }

  append(name: string, value: string): void {
    const key = name.toLowerCase();
    const existing = this.entries.get(key);
    if (existing) {
      existing.values.push(value);
    } else {
      this.entries.set(key, { name, values: [value] });
    }
  }

  /** Copy without the given names. */
  without(names: Iterable<string>): HeaderMap {
    const drop = new Set<string>();
    for (const n of names) drop.add(n.toLowerCase());
    const out = new HeaderMap();
    for (const [key, entry] of this.entries) {
      if (drop.has(key)) continue;
      out.entries.set(key, { name: entry.name, values: [...entry.values] });
    }
    return out;
  }

  toOutgoing(): http.OutgoingHttpHeaders {
    const out: http.OutgoingHttpHeaders = {};
    for (const entry of this.entries.values()) {
      out[entry.name] = entry.values.length === 1 ? entry.values[0] : [...entry.values];
    }
    return out;
  }
}

/** Headers that are connection-specific or invalid once the body is rewritten. */
export const STRIPPED_REQUEST_HEADERS: readonly string[] = [
  'host',
  'content-length',
  'connection',
  'accept-encoding',
  'keep-alive',
  'proxy-connection',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
];

/** Headers dropped from a buffered upstream response before it is replayed. */
export const STRIPPED_RESPONSE_HEADERS: readonly string[] = [
  'content-encoding',
  'content-length',
  'transfer-encoding',
  'connection',
];

export interface SanitizeOptions {
  credential?: string;
  dialect?: Dialect;
}

export function sanitizeHeaders(inbound: HeaderMap, opts: SanitizeOptions = {}): HeaderMap {
  const headers = inbound.without(STRIPPED_REQUEST_HEADERS);
  if (opts.credential) {
    headers.set('authorization', `Bearer ${opts.credential}`);
    if (opts.dialect === 'anthropic') {
      headers.set('x-api-key', opts.credential);
    }
  }
  return headers;
}
