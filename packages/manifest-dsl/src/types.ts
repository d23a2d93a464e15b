/**
 * Keel Manifest DSL — Diagnostics and Result Types
 *
 * Every failure in the system is reported as a structured Diagnostic value:
 * a kind from the closed DiagnosticKind taxonomy, a human-readable message,
 * and an optional source location. Nothing in the compilation path reports
 * failure as bare text or as an uncaught exception.
 *
 * These types are the base layer of the Keel type system. Every other Keel
 * package depends on this package; this package has no internal Keel
 * dependencies.
 */

// ---------------------------------------------------------------------------
// Diagnostic Taxonomy
// ---------------------------------------------------------------------------

/**
 * The closed set of diagnostic kinds.
 *
 * Validator combinators produce the value-level kinds (TypeMismatch through
 * ConflictingAttributes). The orchestrator produces the remaining kinds.
 */
export enum DiagnosticKind {
  /** Source text could not be read or is not valid manifest syntax. */
  ParseError = 'ParseError',
  /** A resource carries a parameter its type does not declare. */
  UnknownParameter = 'UnknownParameter',
  /** A parameter value has the wrong value kind. */
  TypeMismatch = 'TypeMismatch',
  /** A mandatory parameter is absent. */
  MissingRequired = 'MissingRequired',
  /** A parameter value is not one of the allowed values. */
  InvalidEnum = 'InvalidEnum',
  /** A numeric parameter value is outside its allowed range. */
  OutOfRange = 'OutOfRange',
  /** A string parameter value does not have the required shape. */
  InvalidFormat = 'InvalidFormat',
  /** A path parameter is the empty string. */
  EmptyValue = 'EmptyValue',
  /** A path parameter is not absolute. */
  NotAbsolute = 'NotAbsolute',
  /** Two mutually exclusive parameters are both set. */
  ConflictingAttributes = 'ConflictingAttributes',
  /** A relationship targets a resource that is not in the catalog. */
  UnresolvedReference = 'UnresolvedReference',
  /** The interpreter rejected the manifests for this node. */
  InterpreterError = 'InterpreterError',
  /** A cached computation threw instead of returning a result. */
  CacheComputationError = 'CacheComputationError',
  /** Two resources share the same (type, title) identity. */
  DuplicateResource = 'DuplicateResource',
  /** An optional catalog check rejected an otherwise valid catalog. */
  CheckFailed = 'CheckFailed',
  /** A condition that indicates a bug in the caller, not in the manifests. */
  InternalError = 'InternalError',
}

// ---------------------------------------------------------------------------
// Diagnostic
// ---------------------------------------------------------------------------

/** A position in a manifest file. Lines and columns are 1-based. */
export interface SourceLocation {
  readonly file: string;
  readonly line: number;
  readonly column: number;
}

/** A structured error value. */
export interface Diagnostic {
  readonly kind: DiagnosticKind;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
}

/**
 * Result of any fallible operation.
 *
 * A discriminated union: either the value or exactly one diagnostic.
 * There is no partial success.
 */
export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Diagnostic };

/** Build a Diagnostic, omitting the location when none is known. */
export function diagnostic(
  kind: DiagnosticKind,
  message: string,
  location?: SourceLocation,
): Diagnostic {
  return location === undefined ? { kind, message } : { kind, message, location };
}

/** Shorthand for a failed Result carrying a fresh diagnostic. */
export function failure<T>(
  kind: DiagnosticKind,
  message: string,
  location?: SourceLocation,
): Result<T> {
  return { ok: false, error: diagnostic(kind, message, location) };
}

/** Render a location as `file:line:column`. */
export function formatLocation(location: SourceLocation): string {
  return `${location.file}:${location.line}:${location.column}`;
}

/** Render a diagnostic on one line: `Kind: message (at file:line:column)`. */
export function formatDiagnostic(d: Diagnostic): string {
  const where = d.location !== undefined ? ` (at ${formatLocation(d.location)})` : '';
  return `${d.kind}: ${d.message}${where}`;
}
