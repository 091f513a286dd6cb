/**
 * Canonical JSON and content hashing
 */

import { createHash, randomBytes } from 'crypto';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Serialize with object keys sorted at every level, so equal content always
 * produces the same bytes.
 */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }

  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }

  return JSON.stringify(value);
}

export function contentHash(value: JsonValue): string {
  return createHash('sha256').update(canonicalJson(value)).digest('hex');
}

export function generateNonce(): string {
  return randomBytes(20).toString('base64');
}

export const HUMAN_ID_LENGTH = 7;

export function humanId(id: string): string {
  return id.slice(0, HUMAN_ID_LENGTH);
}
