/**
 * Meshconf Kernel: ULID Generator
 *
 * 26-character Crockford Base32 identifiers: a 48-bit millisecond timestamp
 * followed by 80 random bits. Used as the id of every LogEvent so the
 * durable log can be deduplicated and time-sorted when read back.
 *
 * node:crypto is the only dependency; randomness is not I/O.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's Base32 alphabet (no I, L, O, U). */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;

/** Encode `value` as exactly `length` Crockford characters, left zero-padded. */
function encodeCrockford(value: bigint, length: number): string {
  const chars = new Array<string>(length);
  let v = value;
  for (let i = length - 1; i >= 0; i--) {
    chars[i] = CROCKFORD_ALPHABET.charAt(Number(v & 0x1fn));
    v >>= 5n;
  }
  return chars.join('');
}

/**
 * Generate a ULID for the given millisecond timestamp (default: now).
 *
 * @example
 * ulid(); // e.g. '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export function ulid(nowMs: number = Date.now()): string {
  let random = 0n;
  for (const byte of randomBytes(10)) {
    random = (random << 8n) | BigInt(byte);
  }
  return encodeCrockford(BigInt(nowMs), TIME_CHARS) + encodeCrockford(random, RANDOM_CHARS);
}
