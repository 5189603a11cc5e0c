/**
 * Host configuration backed by a JSON document
 *
 * Values are handed out as the exact text they have in the source, so a
 * number such as `9007199254740993` or `1.50` is substituted unchanged.
 */

import { readFileSync } from 'node:fs';
import jsonc, { type Node, type ParseError } from 'jsonc-parser';
import { HostLookupFaultError, MissingHostKeyError } from './errors.js';
import { parseIndex } from './matcher.js';
import type {
  HostConfigurationView,
  HostValue,
  JsonValue,
  ValueType,
} from './types.js';

type ParsedSource = { tree: Node } | { fault: HostLookupFaultError };

const NODE_VALUE_TYPES: Record<Node['type'], ValueType> = {
  object: 'object',
  array: 'array',
  string: 'string',
  number: 'number',
  boolean: 'boolean',
  null: 'null',
  property: 'unknown',
};

function describeParseError(error: ParseError): string {
  return `${jsonc.printParseErrorCode(error.error)} at offset ${error.offset}`;
}

/**
 * Child of an object or array node, or undefined
 */
function childNode(node: Node, segment: string): Node | undefined {
  if (node.type === 'object') {
    // First match wins for duplicate keys.
    const property = node.children?.find(
      child => child.children?.[0]?.value === segment
    );
    return property?.children?.[1];
  }
  if (node.type === 'array') {
    const index = parseIndex(segment);
    return index === null ? undefined : node.children?.[index];
  }
  return undefined;
}

/**
 * Read-only lookup over JSON text or an already parsed tree.
 * Text is parsed once, on first lookup; malformed text is a fault, not a miss.
 */
export class JsonHostConfiguration implements HostConfigurationView {
  private readonly text: string;
  private parsed: ParsedSource | undefined;

  constructor(source: string | JsonValue) {
    this.text = typeof source === 'string' ? source : JSON.stringify(source);
  }

  get(segments: readonly string[]): HostValue {
    let node = this.tree();

    for (const segment of segments) {
      const child = childNode(node, segment);
      if (child === undefined) {
        throw new MissingHostKeyError(segments);
      }
      node = child;
    }

    return { bytes: this.rawText(node), valueType: NODE_VALUE_TYPES[node.type] };
  }

  private rawText(node: Node): string {
    const raw = this.text.slice(node.offset, node.offset + node.length);
    return node.type === 'string' ? raw.slice(1, -1) : raw;
  }

  private tree(): Node {
    if (this.parsed === undefined) {
      this.parsed = this.parse();
    }
    const parsed = this.parsed;
    if ('fault' in parsed) {
      throw parsed.fault;
    }
    return parsed.tree;
  }

  private parse(): ParsedSource {
    const errors: ParseError[] = [];
    const tree = jsonc.parseTree(this.text, errors, {
      disallowComments: true,
      allowTrailingComma: false,
    });

    if (errors.length > 0 || tree === undefined) {
      const reason =
        errors.length > 0 ? errors.map(describeParseError).join(', ') : 'empty document';
      return {
        fault: new HostLookupFaultError(`Host configuration is not valid JSON: ${reason}`),
      };
    }
    return { tree };
  }
}

/**
 * Load the host configuration from a JSON file
 */
export function loadHostConfiguration(path: string): JsonHostConfiguration {
  return new JsonHostConfiguration(readFileSync(path, 'utf8'));
}
