/**
 * Keel Manifest DSL — Abstract Syntax Tree
 *
 * Produced by the parser, consumed by the interpreter. Every node carries
 * the location of its first token so that interpreter diagnostics can point
 * back into the manifest.
 *
 * The language is deliberately small: resource declarations (optionally
 * exported with `@@`), class / define / node definitions, `include`,
 * variable assignment, `if`/`elsif`/`else`, function calls, and exported
 * resource collectors (`Type <<| attr == value |>>`).
 */

import type { Decimal } from './decimal.js';
import type { SourceLocation } from './types.js';

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

/** One piece of a double-quoted string: literal text or a variable lookup. */
export type InterpolationPart =
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'variable'; readonly name: string };

export type Expression =
  | { readonly kind: 'string'; readonly value: string; readonly location: SourceLocation }
  | {
      readonly kind: 'interpolated';
      readonly parts: ReadonlyArray<InterpolationPart>;
      readonly location: SourceLocation;
    }
  | { readonly kind: 'number'; readonly value: Decimal; readonly location: SourceLocation }
  | { readonly kind: 'boolean'; readonly value: boolean; readonly location: SourceLocation }
  | { readonly kind: 'undef'; readonly location: SourceLocation }
  | {
      readonly kind: 'array';
      readonly elements: ReadonlyArray<Expression>;
      readonly location: SourceLocation;
    }
  | { readonly kind: 'variable'; readonly name: string; readonly location: SourceLocation }
  | {
      /** `Package['nginx']` — one reference per title. */
      readonly kind: 'reference';
      readonly type: string;
      readonly titles: ReadonlyArray<Expression>;
      readonly location: SourceLocation;
    }
  | {
      readonly kind: 'call';
      readonly name: string;
      readonly args: ReadonlyArray<Expression>;
      readonly location: SourceLocation;
    }
  | {
      readonly kind: 'comparison';
      readonly operator: '==' | '!=';
      readonly left: Expression;
      readonly right: Expression;
      readonly location: SourceLocation;
    }
  | { readonly kind: 'not'; readonly operand: Expression; readonly location: SourceLocation };

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export interface AttributeAssignment {
  readonly name: string;
  readonly value: Expression;
  readonly location: SourceLocation;
}

/** `title: attr => value, ...` — one resource body inside a declaration. */
export interface ResourceBody {
  readonly title: Expression;
  readonly attributes: ReadonlyArray<AttributeAssignment>;
  readonly location: SourceLocation;
}

/** A class or define parameter, with its optional default expression. */
export interface Parameter {
  readonly name: string;
  readonly defaultValue?: Expression | undefined;
}

export interface ConditionalBranch {
  readonly condition: Expression;
  readonly body: ReadonlyArray<Statement>;
}

/** `default` or a literal node name. */
export type NodeMatcher = { readonly kind: 'default' } | { readonly kind: 'name'; readonly name: string };

export type Statement =
  | {
      readonly kind: 'resource';
      readonly type: string;
      readonly exported: boolean;
      readonly bodies: ReadonlyArray<ResourceBody>;
      readonly location: SourceLocation;
    }
  | {
      readonly kind: 'include';
      readonly names: ReadonlyArray<Expression>;
      readonly location: SourceLocation;
    }
  | {
      readonly kind: 'assignment';
      readonly name: string;
      readonly value: Expression;
      readonly location: SourceLocation;
    }
  | {
      readonly kind: 'if';
      readonly branches: ReadonlyArray<ConditionalBranch>;
      readonly otherwise: ReadonlyArray<Statement>;
      readonly location: SourceLocation;
    }
  | {
      readonly kind: 'collector';
      readonly type: string;
      readonly query?: { readonly attribute: string; readonly value: Expression } | undefined;
      readonly location: SourceLocation;
    }
  | {
      readonly kind: 'call';
      readonly call: Extract<Expression, { kind: 'call' }>;
      readonly location: SourceLocation;
    }
  | {
      readonly kind: 'class';
      readonly name: string;
      readonly parameters: ReadonlyArray<Parameter>;
      readonly body: ReadonlyArray<Statement>;
      readonly location: SourceLocation;
    }
  | {
      readonly kind: 'define';
      readonly name: string;
      readonly parameters: ReadonlyArray<Parameter>;
      readonly body: ReadonlyArray<Statement>;
      readonly location: SourceLocation;
    }
  | {
      readonly kind: 'node';
      readonly matchers: ReadonlyArray<NodeMatcher>;
      readonly body: ReadonlyArray<Statement>;
      readonly location: SourceLocation;
    };

/** Statement kinds that may only appear at the top of a file. */
export type TopLevelStatement = Extract<Statement, { kind: 'class' | 'define' | 'node' }>;

/** The kind of unit the orchestrator can be asked to load. */
export type TopLevelKind = TopLevelStatement['kind'];
