/**
 * Path expansion for replacement rules
 *
 * A match path may contain a single `.*` wildcard. Everything before it
 * locates a node in the document, everything after it is applied to each of
 * that node's direct children. Nested wildcards are not supported: only the
 * first `.*` splits the path and any later one is a literal `*` key.
 */

import { isJsonObject } from './json.js';
import type { ConcretePath, JsonValue } from './types.js';

const WILDCARD = '.*';

/**
 * Split a dot-notated path into segments. Within a segment `~1` stands for
 * a literal `.` and `~0` for `~`.
 */
export function splitPath(path: string): string[] {
  return path
    .split('.')
    .map(segment => segment.replaceAll('~1', '.').replaceAll('~0', '~'));
}

/**
 * Inverse of `splitPath`
 */
export function joinPath(segments: ConcretePath): string {
  return segments
    .map(segment => segment.replaceAll('~', '~0').replaceAll('.', '~1'))
    .join('.');
}

function trimDots(value: string): string {
  return value.replace(/^\.+|\.+$/g, '');
}

/**
 * Parse an array index segment, or return null if it is not one
 */
export function parseIndex(segment: string): number | null {
  return /^\d+$/.test(segment) ? Number(segment) : null;
}

/**
 * Read the node at `segments`, or undefined if any step is missing
 */
export function getPath(
  document: JsonValue,
  segments: ConcretePath
): JsonValue | undefined {
  let node: JsonValue | undefined = document;

  for (const segment of segments) {
    if (Array.isArray(node)) {
      const index = parseIndex(segment);
      node = index === null ? undefined : node[index];
    } else if (isJsonObject(node)) {
      node = Object.hasOwn(node, segment) ? node[segment] : undefined;
    } else {
      return undefined;
    }

    if (node === undefined) {
      return undefined;
    }
  }

  return node;
}

/**
 * Keys of the direct, non-null children of a node
 */
function childKeys(node: JsonValue): string[] {
  if (Array.isArray(node)) {
    return node.flatMap((child, index) =>
      child === null ? [] : [String(index)]
    );
  }
  if (isJsonObject(node)) {
    const object = node;
    return Object.keys(object).filter(key => object[key] !== null);
  }
  return [];
}

/**
 * Expand a match path into the concrete paths it targets in `document`.
 *
 * Without a wildcard the result is the path itself. With one, the result
 * holds one path per child of the prefix node; a missing, null or scalar
 * prefix yields no paths.
 */
export function expandPath(path: string, document: JsonValue): ConcretePath[] {
  const at = path.indexOf(WILDCARD);
  if (at === -1) {
    return [splitPath(path)];
  }

  const prefix = trimDots(path.slice(0, at));
  const suffix = trimDots(path.slice(at + WILDCARD.length));

  // An empty half is the single key "", so `.*.x` looks for a "" key at
  // the root and `a.*` writes a "" key inside each child.
  const prefixSegments = splitPath(prefix);
  const suffixSegments = splitPath(suffix);

  const root = getPath(document, prefixSegments);
  if (root === undefined || root === null) {
    return [];
  }

  return childKeys(root).map(key => [...prefixSegments, key, ...suffixSegments]);
}
