/**
 * Patch pass: resolve, expand and apply every rule in order
 *
 * Rules run strictly left to right and all writes of one rule happen before
 * the next one starts. The first fatal error aborts the pass; the document
 * may already be partially patched and must then be discarded.
 */

import { applyPatch } from './applier.js';
import { parseDocument } from './json.js';
import { expandPath } from './matcher.js';
import { resolveValue } from './resolver.js';
import type {
  HostConfigurationView,
  JsonValue,
  PatchResult,
  ReplacementRule,
} from './types.js';

/**
 * Apply `rules` to a parsed document, mutating it in place
 */
export function patchDocument(
  document: JsonValue,
  rules: readonly ReplacementRule[],
  host: HostConfigurationView
): PatchResult {
  let data = document;
  let pathsWritten = 0;

  for (const rule of rules) {
    const { bytes, valueType } = resolveValue(rule, host);

    for (const path of expandPath(rule.match, data)) {
      data = applyPatch(data, path, bytes, valueType);
      pathsWritten++;
    }
  }

  return { data, rulesApplied: rules.length, pathsWritten };
}

/**
 * Parse a document buffer and apply `rules` to it
 */
export function patchBytes(
  bytes: string | Buffer,
  rules: readonly ReplacementRule[],
  host: HostConfigurationView
): PatchResult {
  return patchDocument(parseDocument(bytes), rules, host);
}
