/**
 * Stable hashing for cache keys, artifact hashes and theme fingerprints.
 */

import { createHash } from 'node:crypto';

import { HASH_LENGTH } from '../constants';

/**
 * JSON with object keys sorted at every depth.
 * `undefined` members are dropped, matching JSON.stringify.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  const parts: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const member: unknown = Reflect.get(value, key);
    if (member === undefined) continue;
    parts.push(`${JSON.stringify(key)}:${stableStringify(member)}`);
  }
  return `{${parts.join(',')}}`;
}

export function hashString(input: string): string {
  return createHash('sha1').update(input).digest('hex').slice(0, HASH_LENGTH);
}

export function fingerprint(value: unknown): string {
  return hashString(stableStringify(value));
}
