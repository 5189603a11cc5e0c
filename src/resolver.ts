/**
 * Value resolution for replacement rules
 *
 * A rule value may reference the host configuration with a placeholder such
 * as `{{config.docker.interface}}`. The host configuration uses camel-cased
 * keys while rules use snake_case, so each path segment is converted before
 * the lookup.
 */

import { HostLookupError, MissingHostKeyError } from './errors.js';
import type {
  HostConfigurationView,
  HostValue,
  ReplacementRule,
  ResolvedValue,
} from './types.js';

/**
 * `{{`, optional whitespace, `config.`, a path of word chars, dots and
 * hyphens, optional whitespace, `}}`
 */
const PLACEHOLDER_SOURCE = String.raw`\{\{\s?config\.([\w.-]+)\s?\}\}`;

const DELIMITERS = new Set(['_', '-', ' ', '.']);

/**
 * Convert a snake/kebab-case key segment to the host's camel-case keys,
 * e.g. `sftp_port` -> `SftpPort`, `docker` -> `Docker`
 */
export function toCamelKey(segment: string): string {
  let result = '';
  let capNext = true;

  for (const char of segment.trim()) {
    if (/[a-zA-Z]/.test(char)) {
      result += capNext ? char.toUpperCase() : char;
      capNext = false;
    } else if (/[0-9]/.test(char)) {
      result += char;
      capNext = true;
    } else {
      capNext = DELIMITERS.has(char);
    }
  }

  return result;
}

/**
 * Path of the first placeholder in a value, or null if there is none
 */
export function findPlaceholderPath(value: string): string | null {
  const match = new RegExp(PLACEHOLDER_SOURCE).exec(value);
  return match ? match[1] : null;
}

/**
 * Resolve a rule's value against the host configuration.
 *
 * A missing host key keeps the placeholder literally so it shows up in the
 * output. Any other lookup failure throws `HostLookupError`.
 */
export function resolveValue(
  rule: ReplacementRule,
  host: HostConfigurationView
): ResolvedValue {
  const huntPath = findPlaceholderPath(rule.value);
  if (huntPath === null) {
    return { bytes: rule.value, valueType: rule.valueType };
  }

  const segments = huntPath.split('.').map(toCamelKey);

  let found: HostValue;
  try {
    found = host.get(segments);
  } catch (error) {
    if (error instanceof MissingHostKeyError) {
      return { bytes: rule.value, valueType: rule.valueType };
    }
    throw new HostLookupError(rule.match, error);
  }

  const replacement = found.bytes;
  // Every placeholder in the value receives the first placeholder's lookup.
  const bytes = rule.value.replace(
    new RegExp(PLACEHOLDER_SOURCE, 'g'),
    () => replacement
  );

  return { bytes, valueType: rule.valueType };
}
