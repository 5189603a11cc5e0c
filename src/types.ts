/**
 * Type definitions for the configuration patch engine
 */

/**
 * A node of a parsed document: object, array or scalar
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Declared kind of a rule's value. Only `number` and `boolean` are coerced
 * on write; every other kind is written as the raw string.
 */
export type ValueType =
  | 'string'
  | 'number'
  | 'boolean'
  | 'object'
  | 'array'
  | 'null'
  | 'unknown';

/**
 * A single path/value replacement
 */
export interface ReplacementRule {
  /** Dot-notated target path, optionally with one `.*` wildcard segment */
  readonly match: string;
  /** Literal value, may contain a `{{ config.<path> }}` placeholder */
  readonly value: string;
  /** Fixed at declaration, never changed by resolution */
  readonly valueType: ValueType;
}

/**
 * A rule's value after placeholder expansion
 */
export interface ResolvedValue {
  bytes: string;
  valueType: ValueType;
}

/**
 * Value found in the host configuration, as its raw text. String values
 * come without their quotes, still escaped.
 */
export interface HostValue {
  bytes: string;
  valueType: ValueType;
}

/**
 * Read-only, byte-oriented view over the host process's own configuration.
 *
 * `get` throws `MissingHostKeyError` when the key path does not exist; any
 * other thrown error is treated as a fault.
 */
export interface HostConfigurationView {
  get(segments: readonly string[]): HostValue;
}

/**
 * Fully resolved, wildcard-free path as unescaped segments
 */
export type ConcretePath = readonly string[];

/**
 * Result of a patch pass
 */
export interface PatchResult {
  /** The patched document */
  data: JsonValue;
  /** Number of rules processed */
  rulesApplied: number;
  /** Number of concrete paths written */
  pathsWritten: number;
}

/**
 * Application configuration loaded from environment
 */
export interface AppConfig {
  /** HTTP server port */
  port: number;
  /** JSON file holding the host configuration */
  hostConfigPath: string;
  /** Maximum number of rules accepted per request */
  maxRules: number;
  /** Body parser size limit */
  bodyLimit: string;
}
