/**
 * JSON serialization with markers for types plain JSON loses.
 *
 * - Date   -> { __type: 'Date', value: ISO string }
 * - BigInt -> { __type: 'BigInt', value: decimal string }
 * - Map    -> { __type: 'Map', value: entries }
 * - Set    -> { __type: 'Set', value: items }
 */

import { createHash } from 'node:crypto';

interface TypedValue {
  __type: string;
  value: unknown;
}

function isTypedValue(value: unknown): value is TypedValue {
  return (
    value !== null &&
    typeof value === 'object' &&
    '__type' in value &&
    typeof value.__type === 'string' &&
    'value' in value
  );
}

function isEntryList(value: unknown): value is Array<[unknown, unknown]> {
  return (
    Array.isArray(value) && value.every((entry) => Array.isArray(entry) && entry.length === 2)
  );
}

/**
 * `JSON.stringify` calls toJSON before the replacer sees a Date, so the
 * replacer reads the raw value from the holder.
 */
export function jsonReplacer(this: unknown, key: string, value: unknown): unknown {
  const raw: unknown =
    this !== null && typeof this === 'object' && key in this
      ? Reflect.get(this, key)
      : value;

  if (raw instanceof Date) {
    return { __type: 'Date', value: raw.toISOString() };
  }
  if (typeof raw === 'bigint') {
    return { __type: 'BigInt', value: raw.toString() };
  }
  if (raw instanceof Map) {
    return { __type: 'Map', value: Array.from(raw.entries()) };
  }
  if (raw instanceof Set) {
    return { __type: 'Set', value: Array.from(raw) };
  }
  return value;
}

export function jsonReviver(_key: string, value: unknown): unknown {
  if (!isTypedValue(value)) {
    return value;
  }
  switch (value.__type) {
    case 'Date':
      return typeof value.value === 'string' ? new Date(value.value) : value;
    case 'BigInt':
      return typeof value.value === 'string' ? BigInt(value.value) : value;
    case 'Map':
      return isEntryList(value.value) ? new Map(value.value) : value;
    case 'Set':
      return Array.isArray(value.value) ? new Set(value.value) : value;
    default:
      return value;
  }
}

export function serialize(value: unknown, space?: number): string {
  return JSON.stringify(value, jsonReplacer, space);
}

/**
 * Parse a string produced by `serialize`. Callers validate the shape.
 */
export function deserialize(json: string): unknown {
  return JSON.parse(json, jsonReviver);
}

/** Hex SHA-256 of a UTF-8 string. */
export function checksum(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/** UTF-8 byte length of a string. */
export function byteLength(text: string): number {
  return new TextEncoder().encode(text).length;
}

/**
 * Longest prefix of `text` whose UTF-8 encoding fits `maxBytes`, never splitting a code point.
 */
export function truncateToBytes(text: string, maxBytes: number): string {
  if (maxBytes <= 0) return '';
  if (byteLength(text) <= maxBytes) return text;

  let used = 0;
  let end = 0;
  for (const char of text) {
    const size = byteLength(char);
    if (used + size > maxBytes) break;
    used += size;
    end += char.length;
  }
  return text.slice(0, end);
}
