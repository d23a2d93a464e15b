/**
 * Keel Interpreter — Value Semantics
 *
 * Truthiness, string conversion for interpolation and titles, and the
 * equality used by `==` / `!=` and collector queries.
 */

import type { Value } from '@keel/manifest-dsl';
import { formatDecimal, valueEquals } from '@keel/manifest-dsl';

/** undef, false and the empty string are false; everything else is true. */
export function truthy(value: Value): boolean {
  switch (value.kind) {
    case 'undefined':
      return false;
    case 'boolean':
      return value.value;
    case 'string':
      return value.value !== '';
    default:
      return true;
  }
}

/** Text of a value inside a double-quoted string. Arrays join with a space. */
export function interpolationText(value: Value): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'number':
      return formatDecimal(value.value);
    case 'array':
      return value.values.map(interpolationText).join(' ');
    case 'undefined':
      return '';
  }
}

/** Equality with case-insensitive string comparison. */
export function looselyEqual(a: Value, b: Value): boolean {
  if (a.kind === 'string' && b.kind === 'string') {
    return a.value.toLowerCase() === b.value.toLowerCase();
  }
  if (a.kind === 'array' && b.kind === 'array') {
    return (
      a.values.length === b.values.length &&
      a.values.every((item, i) => {
        const other = b.values[i];
        return other !== undefined && looselyEqual(item, other);
      })
    );
  }
  return valueEquals(a, b);
}
