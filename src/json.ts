/**
 * Helpers for working with parsed JSON trees
 */

import { MalformedDocumentError } from './errors.js';
import type { JsonObject, JsonValue } from './types.js';

/**
 * Type guard to check if a value is a plain object node
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    (Object.getPrototypeOf(value) === Object.prototype ||
      Object.getPrototypeOf(value) === null)
  );
}

/**
 * Parse a document buffer. Fails before any rule is processed.
 */
export function parseDocument(bytes: string | Buffer): JsonValue {
  const text = typeof bytes === 'string' ? bytes : bytes.toString('utf8');
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new MalformedDocumentError(error);
  }
}

/**
 * Text form of a host value as substituted into a rule value.
 * Strings are used verbatim, everything else as compact JSON.
 */
export function stringifyValue(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
