/**
 * Keel Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier, used as the
 * `event_id` of every line in compile.jsonl.
 *
 * ULID format: 26 characters, Crockford Base32 encoded.
 *   - 10 chars: 48-bit millisecond timestamp (lexicographically sortable)
 *   - 16 chars: 80-bit cryptographic random
 *
 * The random component is not incremented within one millisecond, so two
 * ids from the same millisecond sort arbitrarily.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Excludes I, L, O, U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;

/** Encode exactly `length` characters, zero-padded on the left. */
function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = (CROCKFORD_ALPHABET[Number(v & 0x1fn)] ?? '0') + out;
    v >>= 5n;
  }
  return out;
}

/**
 * Generate a new ULID string.
 *
 * @param now - Milliseconds since the epoch
 * @param random - Source of `RANDOM_BYTES` random bytes
 *
 * @example
 * ulid(0, () => Buffer.alloc(10)) // '00000000000000000000000000'
 */
export function ulid(
  now: number = Date.now(),
  random: (size: number) => Uint8Array = randomBytes,
): string {
  let randValue = 0n;
  for (const byte of random(RANDOM_BYTES)) {
    randValue = (randValue << 8n) | BigInt(byte);
  }
  return encodeCrockford(BigInt(now), TIME_CHARS) + encodeCrockford(randValue, RANDOM_CHARS);
}
