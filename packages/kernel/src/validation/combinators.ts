/**
 * Keel Kernel — Validator Combinators
 *
 * Each combinator enforces one constraint on one parameter of a resource.
 * A combinator is a pure, total function from a Resource to a Result: it
 * either passes the resource through (possibly with a rewritten attribute or
 * title) or fails with exactly one diagnostic. No combinator performs I/O.
 *
 * "Absent" means the key is not in the attribute map. A key mapped to the
 * undefined value is present and fails the type-checking combinators.
 *
 * Combinators for one resource type are composed with parameterFunctions():
 * parameters in declaration order, validators per parameter in declaration
 * order, stopping at the first failure.
 */

import type { Decimal, Result, Value } from '@keel/manifest-dsl';
import {
  DiagnosticKind,
  arr,
  compareDecimal,
  failure,
  formatDecimal,
  isIntegral,
  num,
  parseDecimal,
  showValue,
  str,
} from '@keel/manifest-dsl';
import type { Resource } from '../types/resource.js';
import { withAttribute, withTitle } from '../types/resource.js';

/** A validation step over a whole resource. */
export type Validator = (resource: Resource) => Result<Resource>;

/** A validator factory for one named parameter. */
export type ParameterValidator = (param: string) => Validator;

/** Ordered validation rules: each parameter with its validators. */
export type ParameterRules = ReadonlyArray<readonly [string, ReadonlyArray<ParameterValidator>]>;

function pass(resource: Resource): Result<Resource> {
  return { ok: true, value: resource };
}

/** Run validators in order, stopping at the first failure. */
export function chain(validators: ReadonlyArray<Validator>): Validator {
  return (resource) => {
    let current = resource;
    for (const validate of validators) {
      const result = validate(current);
      if (!result.ok) {
        return result;
      }
      current = result.value;
    }
    return pass(current);
  };
}

/**
 * Apply every parameter's validators, in declaration order, short-circuiting
 * on the first failure.
 */
export function parameterFunctions(rules: ParameterRules): Validator {
  return chain(rules.flatMap(([param, validators]) => validators.map((v) => v(param))));
}

// ---------------------------------------------------------------------------
// Element helpers
// ---------------------------------------------------------------------------

type Coercion = (param: string, value: Value) => Result<Value>;

/**
 * Build the scalar and array forms of a coercing combinator. The scalar form
 * applies `coerce` to a present value; the array form requires an Array and
 * applies it to each element.
 */
function rewriting(coerce: Coercion): { scalar: ParameterValidator; elements: ParameterValidator } {
  const scalar: ParameterValidator = (param) => (resource) => {
    const value = resource.attributes.get(param);
    if (value === undefined) {
      return pass(resource);
    }
    const coerced = coerce(param, value);
    if (!coerced.ok) {
      return coerced;
    }
    return pass(coerced.value === value ? resource : withAttribute(resource, param, coerced.value));
  };
  const elements: ParameterValidator = (param) => (resource) => {
    const value = resource.attributes.get(param);
    if (value === undefined) {
      return pass(resource);
    }
    if (value.kind !== 'array') {
      return failure(
        DiagnosticKind.TypeMismatch,
        `Parameter ${param} should be an array, not ${showValue(value)}`,
      );
    }
    const rewritten: Value[] = [];
    let changed = false;
    for (const element of value.values) {
      const coerced = coerce(param, element);
      if (!coerced.ok) {
        return coerced;
      }
      changed = changed || coerced.value !== element;
      rewritten.push(coerced.value);
    }
    return pass(changed ? withAttribute(resource, param, arr(rewritten)) : resource);
  };
  return { scalar, elements };
}

function toStringValue(param: string, value: Value): Result<Value> {
  switch (value.kind) {
    case 'string':
      return { ok: true, value };
    case 'boolean':
      return { ok: true, value: str(value.value ? 'true' : 'false') };
    case 'number':
      return { ok: true, value: str(formatDecimal(value.value)) };
    case 'array':
    case 'undefined':
      return failure(
        DiagnosticKind.TypeMismatch,
        `Parameter ${param} should be a string, not ${showValue(value)}`,
      );
  }
}

function toIntegerValue(param: string, value: Value): Result<Value> {
  const text = toStringValue(param, value);
  if (!text.ok) {
    return text;
  }
  const parsed = text.value.kind === 'string' ? parseDecimal(text.value.value) : null;
  if (parsed === null || !isIntegral(parsed)) {
    return failure(
      DiagnosticKind.TypeMismatch,
      `Parameter ${param} must be an integer, not ${showValue(value)}`,
    );
  }
  return { ok: true, value: value.kind === 'number' ? value : num(parsed) };
}

function toAbsolutePath(param: string, value: Value): Result<Value> {
  if (value.kind !== 'string') {
    return failure(
      DiagnosticKind.TypeMismatch,
      `Parameter ${param} should be a path string, not ${showValue(value)}`,
    );
  }
  if (value.value === '') {
    return failure(DiagnosticKind.EmptyValue, `Empty path for parameter ${param}`);
  }
  if (!value.value.startsWith('/')) {
    return failure(
      DiagnosticKind.NotAbsolute,
      `Path must be absolute, not ${value.value} for parameter ${param}`,
    );
  }
  return { ok: true, value };
}

// ---------------------------------------------------------------------------
// Type coercions
// ---------------------------------------------------------------------------

const stringRules = rewriting(toStringValue);
const integerRules = rewriting(toIntegerValue);
const pathRules = rewriting(toAbsolutePath);

/** Booleans and numbers become their canonical text; arrays and undef fail. */
export const string: ParameterValidator = stringRules.scalar;

/** `string` applied to every element of an Array parameter. */
export const strings: ParameterValidator = stringRules.elements;

/** `string`, then the text must be an exact integer; rewritten to a Number. */
export const integer: ParameterValidator = integerRules.scalar;

/** `integer` applied to every element of an Array parameter. */
export const integers: ParameterValidator = integerRules.elements;

/** A present value must be a non-empty absolute path. */
export const fullyQualified: ParameterValidator = pathRules.scalar;

/** `fullyQualified` applied to every element of an Array parameter. */
export const fullyQualifieds: ParameterValidator = pathRules.elements;

/** A present non-Array value is wrapped in a one-element Array. */
export const rarray: ParameterValidator = (param) => (resource) => {
  const value = resource.attributes.get(param);
  if (value === undefined || value.kind === 'array') {
    return pass(resource);
  }
  return pass(withAttribute(resource, param, arr([value])));
};

// ---------------------------------------------------------------------------
// Constraints
// ---------------------------------------------------------------------------

/** A present value must be one of the allowed strings. */
export function values(allowed: ReadonlyArray<string>): ParameterValidator {
  return (param) => (resource) => {
    const value = resource.attributes.get(param);
    if (value === undefined) {
      return pass(resource);
    }
    if (value.kind === 'string' && allowed.includes(value.value)) {
      return pass(resource);
    }
    return failure(
      DiagnosticKind.InvalidEnum,
      `Parameter ${param} value should be one of [${allowed.join(', ')}] and not ${showValue(value)}`,
    );
  };
}

/** Sets an absent parameter to a string default. Never overwrites. */
export function defaultvalue(value: string): ParameterValidator {
  return (param) => (resource) =>
    pass(resource.attributes.has(param) ? resource : withAttribute(resource, param, str(value)));
}

export const mandatory: ParameterValidator = (param) => (resource) =>
  resource.attributes.has(param)
    ? pass(resource)
    : failure(DiagnosticKind.MissingRequired, `Parameter ${param} should be set`);

/** `mandatory`, except when `ensure` is the string "absent". */
export const mandatoryIfNotAbsent: ParameterValidator = (param) => (resource) => {
  const ensure = resource.attributes.get('ensure');
  if (ensure?.kind === 'string' && ensure.value === 'absent') {
    return pass(resource);
  }
  return mandatory(param)(resource);
};

/** A string value must not end with `/`. Other values pass. */
export const noTrailingSlash: ParameterValidator = (param) => (resource) => {
  const value = resource.attributes.get(param);
  if (value?.kind === 'string' && value.value.endsWith('/')) {
    return failure(DiagnosticKind.InvalidFormat, `Parameter ${param} should not have a trailing slash`);
  }
  return pass(resource);
};

const OCTET = /^\d+$/;

/** True for exactly four dot-separated decimal groups, each 0..255. */
export function isIPv4(text: string): boolean {
  const groups = text.split('.');
  return (
    groups.length === 4 &&
    groups.every((group) => OCTET.test(group) && Number.parseInt(group, 10) <= 255)
  );
}

export const ipaddr: ParameterValidator = (param) => (resource) => {
  const value = resource.attributes.get(param);
  if (value === undefined) {
    return pass(resource);
  }
  if (value.kind !== 'string') {
    return failure(
      DiagnosticKind.TypeMismatch,
      `Parameter ${param} should be an IP address string, not ${showValue(value)}`,
    );
  }
  return isIPv4(value.value)
    ? pass(resource)
    : failure(DiagnosticKind.InvalidFormat, `Invalid IP address for parameter ${param}`);
};

/** A present Number must lie in [low, high]. */
export function inrange(low: number, high: number): ParameterValidator {
  const lower = decimalOf(low);
  const upper = decimalOf(high);
  return (param) => (resource) => {
    const value = resource.attributes.get(param);
    if (value === undefined) {
      return pass(resource);
    }
    if (value.kind !== 'number') {
      return failure(
        DiagnosticKind.TypeMismatch,
        `Parameter ${param} should be a number, not ${showValue(value)}`,
      );
    }
    if (compareDecimal(value.value, lower) < 0 || compareDecimal(value.value, upper) > 0) {
      return failure(
        DiagnosticKind.OutOfRange,
        `Parameter ${param}'s value should be between ${low} and ${high}`,
      );
    }
    return pass(resource);
  };
}

function decimalOf(n: number): Decimal {
  const parsed = parseDecimal(String(n));
  if (parsed === null) {
    throw new RangeError(`Range bound is not a finite decimal: ${n}`);
  }
  return parsed;
}

/**
 * `string`, then: an absent parameter takes the resource title; a present
 * one becomes the resource title.
 */
export const nameval: ParameterValidator = (param) => (resource) => {
  const coerced = string(param)(resource);
  if (!coerced.ok) {
    return coerced;
  }
  const value = coerced.value.attributes.get(param);
  if (value === undefined) {
    return pass(withAttribute(coerced.value, param, str(coerced.value.id.title)));
  }
  if (value.kind !== 'string') {
    return failure(
      DiagnosticKind.TypeMismatch,
      `Parameter ${param} should be a string, not ${showValue(value)}`,
    );
  }
  return pass(value.value === coerced.value.id.title ? coerced.value : withTitle(coerced.value, value.value));
};

export const validateSourceOrContent: Validator = (resource) =>
  resource.attributes.has('source') && resource.attributes.has('content')
    ? failure(
        DiagnosticKind.ConflictingAttributes,
        "Source and content can't be specified at the same time",
      )
    : pass(resource);
