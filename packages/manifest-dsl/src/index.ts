/**
 * @keel/manifest-dsl
 *
 * Keel manifest language — values, exact decimals, diagnostics, AST, lexer
 * and parser.
 *
 * This package is the base layer of the Keel type system. All other Keel
 * packages depend on it; it has no internal Keel dependencies and performs
 * no I/O.
 */

// Diagnostics
export type { Diagnostic, Result, SourceLocation } from './types.js';
export {
  DiagnosticKind,
  diagnostic,
  failure,
  formatDiagnostic,
  formatLocation,
} from './types.js';

// Numbers and values
export type { Decimal } from './decimal.js';
export {
  compareDecimal,
  decimalFromInteger,
  formatDecimal,
  isIntegral,
  parseDecimal,
} from './decimal.js';
export type { Value, ValueKind } from './value.js';
export { UNDEFINED, arr, bool, num, showValue, str, valueEquals } from './value.js';

// Syntax
export type {
  AttributeAssignment,
  ConditionalBranch,
  Expression,
  InterpolationPart,
  NodeMatcher,
  Parameter,
  ResourceBody,
  Statement,
  TopLevelKind,
  TopLevelStatement,
} from './ast.js';
export type { Token, TokenKind } from './lexer.js';
export { tokenize } from './lexer.js';
export { parse } from './parser.js';
