/**
 * Keel Manifest DSL — Arbitrary-Precision Decimals
 *
 * Numbers in manifests are exact decimals. A Decimal is a BigInt coefficient
 * scaled by a power of ten. Values are always normalized so that two equal
 * numbers have identical representations: the coefficient carries no
 * trailing zeros, and zero is `0e0`.
 *
 * This module has no dependencies and no side effects.
 */

/** An exact decimal number: coefficient × 10^exponent. */
export interface Decimal {
  readonly coefficient: bigint;
  readonly exponent: number;
}

/** Exponents beyond this magnitude are rejected when parsing. */
const MAX_EXPONENT = 4096;

const DECIMAL_PATTERN = /^(-?)(\d+)(?:\.(\d+))?(?:[eE]([+-]?\d+))?$/;

function normalize(coefficient: bigint, exponent: number): Decimal {
  if (coefficient === 0n) {
    return { coefficient: 0n, exponent: 0 };
  }
  let c = coefficient;
  let e = exponent;
  while (c % 10n === 0n) {
    c /= 10n;
    e += 1;
  }
  return { coefficient: c, exponent: e };
}

/**
 * Parse decimal text.
 *
 * Accepts an optional leading minus, digits, an optional fractional part and
 * an optional exponent (`12`, `-0.5`, `1.5e3`). Returns null for anything
 * else, including surrounding whitespace.
 *
 * @example
 * formatDecimal(parseDecimal('12.50')!) // '12.5'
 * parseDecimal('12 ')                   // null
 */
export function parseDecimal(text: string): Decimal | null {
  const match = DECIMAL_PATTERN.exec(text);
  if (match === null) {
    return null;
  }
  const negative = match[1] === '-';
  const integerDigits = match[2] ?? '0';
  const fractionDigits = match[3] ?? '';
  const exponent = match[4] !== undefined ? Number.parseInt(match[4], 10) : 0;
  const scaled = exponent - fractionDigits.length;
  if (Math.abs(scaled) > MAX_EXPONENT) {
    return null;
  }
  const magnitude = BigInt(integerDigits + fractionDigits);
  return normalize(negative ? -magnitude : magnitude, scaled);
}

/** A Decimal holding an integer. */
export function decimalFromInteger(value: bigint): Decimal {
  return normalize(value, 0);
}

/** True when the decimal has no fractional part. */
export function isIntegral(d: Decimal): boolean {
  return d.exponent >= 0;
}

/**
 * Canonical text of a decimal: plain notation, no exponent, no trailing
 * fractional zeros, no leading zeros beyond a single `0` before the point.
 */
export function formatDecimal(d: Decimal): string {
  if (d.exponent >= 0) {
    return (d.coefficient * 10n ** BigInt(d.exponent)).toString();
  }
  const negative = d.coefficient < 0n;
  let digits = (negative ? -d.coefficient : d.coefficient).toString();
  const scale = -d.exponent;
  if (digits.length <= scale) {
    digits = '0'.repeat(scale - digits.length + 1) + digits;
  }
  const integerPart = digits.slice(0, digits.length - scale);
  const fractionPart = digits.slice(digits.length - scale);
  return `${negative ? '-' : ''}${integerPart}.${fractionPart}`;
}

/** Three-way comparison: -1, 0 or 1. */
export function compareDecimal(a: Decimal, b: Decimal): -1 | 0 | 1 {
  const exponent = Math.min(a.exponent, b.exponent);
  const left = a.coefficient * 10n ** BigInt(a.exponent - exponent);
  const right = b.coefficient * 10n ** BigInt(b.exponent - exponent);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
