/**
 * Error taxonomy for a patch pass
 *
 * Only `MissingHostKeyError` is recoverable; every other error aborts the
 * pass and the partially patched document must be discarded.
 */

export type PatchErrorCode =
  | 'MISSING_HOST_KEY'
  | 'HOST_LOOKUP_FAULT'
  | 'TREE_WRITE_FAULT'
  | 'MALFORMED_DOCUMENT'
  | 'INVALID_RULE';

export class PatchError extends Error {
  readonly code: PatchErrorCode;

  constructor(code: PatchErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The requested key path is absent from the host configuration
 */
export class MissingHostKeyError extends PatchError {
  readonly segments: readonly string[];

  constructor(segments: readonly string[]) {
    super('MISSING_HOST_KEY', `Key path not found: ${segments.join('.')}`);
    this.segments = segments;
  }
}

/**
 * The host configuration store itself is unusable (malformed, unreadable)
 */
export class HostLookupFaultError extends PatchError {
  constructor(message: string, options?: ErrorOptions) {
    super('HOST_LOOKUP_FAULT', message, options);
  }
}

/**
 * A lookup for a specific rule failed for a reason other than a missing key
 */
export class HostLookupError extends PatchError {
  readonly match: string;

  constructor(match: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'HOST_LOOKUP_FAULT',
      `Failed to look up host configuration for "${match}": ${reason}`,
      { cause }
    );
    this.match = match;
  }
}

/**
 * The document structure prevents a write at the given path
 */
export class TreeWriteError extends PatchError {
  readonly path: readonly string[];

  constructor(path: readonly string[], reason: string) {
    super('TREE_WRITE_FAULT', `Cannot set "${path.join('.')}": ${reason}`);
    this.path = path;
  }
}

export class MalformedDocumentError extends PatchError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('MALFORMED_DOCUMENT', `Document is not valid JSON: ${reason}`, {
      cause,
    });
  }
}

export class InvalidRuleError extends PatchError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('INVALID_RULE', `Invalid replacement rules: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
