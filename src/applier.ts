/**
 * Writes coerced values into a document tree
 */

import { TreeWriteError } from './errors.js';
import { isJsonObject } from './json.js';
import { parseIndex } from './matcher.js';
import type { ConcretePath, JsonObject, JsonValue, ValueType } from './types.js';

const APPEND_SEGMENT = '-';

const TRUE_LITERALS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);

/**
 * Permissive integer parse: anything that is not a whole base-10 integer in
 * the safe range becomes 0
 */
function parseInteger(text: string): number {
  if (!/^[+-]?\d+$/.test(text)) {
    return 0;
  }
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : 0;
}

/**
 * Convert resolved text to the scalar written for its declared type
 */
export function coerceValue(bytes: string, valueType: ValueType): JsonValue {
  switch (valueType) {
    case 'number':
      return parseInteger(bytes);
    case 'boolean':
      return TRUE_LITERALS.has(bytes);
    default:
      return bytes;
  }
}

/**
 * Own property of an object node; inherited members read as absent
 */
function ownChild(node: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(node, key) ? node[key] : undefined;
}

/**
 * Store `value` under `key` as an own property. `__proto__` is defined
 * rather than assigned so it never replaces the node's prototype.
 */
function writeChild(node: JsonObject, key: string, value: JsonValue): void {
  if (key === '__proto__') {
    Object.defineProperty(node, key, {
      value,
      writable: true,
      enumerable: true,
      configurable: true,
    });
    return;
  }
  node[key] = value;
}

/**
 * Set `value` at `segments`, creating missing or null intermediate objects.
 *
 * Returns the document root, which is a new object when the input root was
 * null, or `value` itself for an empty path.
 */
export function setPath(
  document: JsonValue,
  segments: ConcretePath,
  value: JsonValue
): JsonValue {
  if (segments.length === 0) {
    return value;
  }

  const root: JsonValue = document === null ? {} : document;
  let node: JsonValue = root;

  for (let depth = 0; depth < segments.length; depth++) {
    const segment = segments[depth];
    const last = depth === segments.length - 1;

    if (isJsonObject(node)) {
      if (last) {
        writeChild(node, segment, value);
        break;
      }
      const child = ownChild(node, segment);
      if (child === undefined || child === null) {
        const created: JsonObject = {};
        writeChild(node, segment, created);
        node = created;
      } else {
        node = child;
      }
    } else if (Array.isArray(node)) {
      if (segment === APPEND_SEGMENT) {
        if (depth === 0) {
          throw new TreeWriteError(
            segments,
            'cannot append to an array at the root of the path'
          );
        }
        const appended: JsonValue = last ? value : {};
        node.push(appended);
        node = appended;
        continue;
      }

      const index = parseIndex(segment);
      if (index === null) {
        throw new TreeWriteError(
          segments,
          `found array but segment "${segment}" is not an array index`
        );
      }
      if (index >= node.length) {
        throw new TreeWriteError(
          segments,
          `index ${index} exceeds array size ${node.length}`
        );
      }
      if (last) {
        node[index] = value;
        break;
      }
      const child: JsonValue = node[index];
      if (child === null) {
        throw new TreeWriteError(segments, `element ${index} is null`);
      }
      node = child;
    } else {
      const holder = depth === 0 ? 'document root' : `"${segments[depth - 1]}"`;
      throw new TreeWriteError(
        segments,
        `${holder} holds a ${typeof node}, not an object`
      );
    }
  }

  return root;
}

/**
 * Coerce `bytes` by `valueType` and write it at `path`
 */
export function applyPatch(
  document: JsonValue,
  path: ConcretePath,
  bytes: string,
  valueType: ValueType
): JsonValue {
  return setPath(document, path, coerceValue(bytes, valueType));
}
