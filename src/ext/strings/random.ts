/**
 * Random string generation.
 */

import crypto from 'node:crypto';

/**
 * Source of uniform random integers.
 * Implementations must be safe to share between concurrent callers.
 */
export interface RandomSource {
  /** Uniform integer in [0, bound) */
  nextInt(bound: number): number;
}

/** Default source backed by the platform CSPRNG */
export const cryptoRandomSource: RandomSource = {
  nextInt: (bound) => crypto.randomInt(bound),
};

const LOWER = 'abcdefghijklmnopqrstuvwxyz';
const UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const DIGITS = '0123456789';

/** Printable ASCII, 0x20 (space) through 0x7E (~) */
const PRINTABLE = Array.from({ length: 0x7e - 0x20 + 1 }, (_, i) =>
  String.fromCharCode(0x20 + i)
).join('');

export const ALPHABETS = {
  alphaNumeric: UPPER + LOWER + DIGITS,
  alpha: UPPER + LOWER,
  ascii: PRINTABLE,
  numeric: DIGITS,
} as const;

/**
 * `count` characters drawn uniformly from `alphabet`.
 * The whole string is built in memory, so `count` is bounded in
 * practice by the maximum string length (2^29 - 24 UTF-16 units on V8).
 */
export function randomString(
  source: RandomSource,
  alphabet: string,
  count: number
): string {
  let result = '';
  for (let i = 0; i < count; i++) {
    result += alphabet.charAt(source.nextInt(alphabet.length));
  }
  return result;
}
