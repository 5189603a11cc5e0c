/**
 * Wire format for replacement rule sets
 *
 * Rules arrive as `{ "match": "server.port", "replace_with": 25565 }`. The
 * declared value type is taken from the JSON kind of `replace_with` unless
 * `value_type` names one explicitly.
 */

import { z } from 'zod';
import { InvalidRuleError } from './errors.js';
import { stringifyValue } from './json.js';
import type { JsonValue, ReplacementRule, ValueType } from './types.js';

const valueTypes = [
  'string',
  'number',
  'boolean',
  'object',
  'array',
  'null',
  'unknown',
] as const satisfies readonly ValueType[];

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const wireRuleSchema = z.object({
  match: z.string().trim().min(1, 'match cannot be empty'),
  replace_with: jsonValueSchema,
  value_type: z.enum(valueTypes).optional(),
});

export type WireRule = z.infer<typeof wireRuleSchema>;

/**
 * JSON kind of a value
 */
export function inferValueType(value: JsonValue): ValueType {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'object';
  }
}

/**
 * Build a rule from its wire form
 */
export function toReplacementRule(wire: WireRule): ReplacementRule {
  return Object.freeze({
    match: wire.match,
    value: stringifyValue(wire.replace_with),
    valueType: wire.value_type ?? inferValueType(wire.replace_with),
  });
}

/**
 * Validate and convert a rule set. Throws `InvalidRuleError` listing every
 * problem found.
 */
export function parseReplacementRules(
  input: unknown,
  options: { max?: number } = {}
): ReplacementRule[] {
  let schema = z.array(wireRuleSchema);
  if (options.max !== undefined) {
    schema = schema.max(options.max, `at most ${options.max} rules allowed`);
  }

  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidRuleError(
      result.error.issues.map(issue =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message
      )
    );
  }

  return result.data.map(toReplacementRule);
}
