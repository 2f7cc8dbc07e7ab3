/**
 * Canonical JSON serialization and content hashing.
 *
 * Canonical form: mapping keys sorted recursively, no whitespace.
 */

import { createHash } from 'node:crypto';
import type { JsonValue } from './types.js';
import { isJsonObject } from './types.js';

function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isJsonObject(value)) {
    const sorted: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key] ?? null);
    }
    return sorted;
  }
  return value;
}

/**
 * Serialize a JSON value in canonical form.
 */
export function canonicalJson(value: JsonValue): string {
  return JSON.stringify(sortKeys(value));
}

/**
 * SHA-256 hex digest of the canonical form.
 */
export function contentHash(value: JsonValue): string {
  return createHash('sha256').update(canonicalJson(value), 'utf8').digest('hex');
}

/**
 * Freeze a JSON value and everything inside it.
 */
export function deepFreeze<T extends JsonValue>(value: T): T {
  if (Array.isArray(value)) {
    for (const item of value) {
      deepFreeze(item);
    }
    Object.freeze(value);
    return value;
  }
  if (isJsonObject(value)) {
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
    Object.freeze(value);
  }
  return value;
}
