/**
 * Keel Manifest DSL — Values
 *
 * The closed set of value kinds a resource attribute can hold. Every
 * consumer branches on `kind` exhaustively; there is no other runtime shape.
 */

import type { Decimal } from './decimal.js';
import { compareDecimal, formatDecimal, parseDecimal } from './decimal.js';

export type Value =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'number'; readonly value: Decimal }
  | { readonly kind: 'array'; readonly values: ReadonlyArray<Value> }
  | { readonly kind: 'undefined' };

export type ValueKind = Value['kind'];

export const UNDEFINED: Value = { kind: 'undefined' };

export function str(value: string): Value {
  return { kind: 'string', value };
}

export function bool(value: boolean): Value {
  return { kind: 'boolean', value };
}

/**
 * A Number value. Accepts a Decimal, or decimal text / a JS number that is
 * converted through its string form.
 *
 * @throws {RangeError} If the text is not a decimal number
 */
export function num(value: Decimal | string | number): Value {
  if (typeof value === 'object') {
    return { kind: 'number', value };
  }
  const parsed = parseDecimal(String(value));
  if (parsed === null) {
    throw new RangeError(`Not a decimal number: ${JSON.stringify(String(value))}`);
  }
  return { kind: 'number', value: parsed };
}

export function arr(values: ReadonlyArray<Value>): Value {
  return { kind: 'array', values };
}

/**
 * Render a value for diagnostics: strings are double-quoted, arrays are
 * bracketed, the undefined value is `undef`.
 */
export function showValue(v: Value): string {
  switch (v.kind) {
    case 'string':
      return JSON.stringify(v.value);
    case 'boolean':
      return v.value ? 'true' : 'false';
    case 'number':
      return formatDecimal(v.value);
    case 'array':
      return '[' + v.values.map(showValue).join(', ') + ']';
    case 'undefined':
      return 'undef';
  }
}

/** Structural equality. Numbers compare by value, not representation. */
export function valueEquals(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'string':
    case 'boolean':
      return b.kind === a.kind && b.value === a.value;
    case 'number':
      return b.kind === 'number' && compareDecimal(a.value, b.value) === 0;
    case 'array':
      return (
        b.kind === 'array' &&
        a.values.length === b.values.length &&
        a.values.every((item, i) => {
          const other = b.values[i];
          return other !== undefined && valueEquals(item, other);
        })
      );
    case 'undefined':
      return b.kind === 'undefined';
  }
}
