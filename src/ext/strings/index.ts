/**
 * Strings Extension Factory
 *
 * Text functions for template engines: encoding, abbreviation,
 * trimming, splitting and random generation. Argument order puts the
 * subject string last so functions compose in pipelines
 * (`"$5.00" | trimAll "$"`).
 */

import { defineFunction, type HostFunction } from '../../runtime/core/callable.js';
import { err, ok } from '../../runtime/core/result.js';
import { params, types } from '../../runtime/core/signature.js';
import type { ExtensionResult } from '../../runtime/ext/extensions.js';
import {
  base32Decode,
  base32Encode,
  base64Decode,
  base64Encode,
} from './encoding.js';
import { ALPHABETS, cryptoRandomSource, randomString, type RandomSource } from './random.js';
import {
  initials,
  joinValues,
  replaceAll,
  splitToMap,
  trimChars,
  trimPrefix,
  trimSuffix,
  trimWhitespace,
  untitle,
} from './transform.js';
import { abbrev, abbrevboth, substring, trunc } from './truncate.js';

// ============================================================
// TYPES
// ============================================================

/** Strings extension configuration */
export interface StringsConfig {
  /** Randomness for the rand* functions (default: node:crypto) */
  random?: RandomSource | undefined;
}

/** Names of every function the extension provides */
export const STRING_FUNCTION_NAMES = [
  'base64encode',
  'base64decode',
  'base32encode',
  'base32decode',
  'abbrev',
  'abbrevboth',
  'initials',
  'randAlphaNum',
  'randAlpha',
  'randAscii',
  'randNumeric',
  'untitle',
  'replace',
  'plural',
  'trunc',
  'join',
  'split',
  'substring',
  'trim',
  'trimAll',
  'trimSuffix',
  'trimPrefix',
  'contains',
  'hasSuffix',
  'hasPrefix',
] as const;

export type StringFunctionName = (typeof STRING_FUNCTION_NAMES)[number];

// ============================================================
// FACTORY
// ============================================================

/**
 * Create the strings extension.
 *
 * @example
 * ```typescript
 * const table = new FunctionTable().registerAll(createStringsExtension());
 * table.call('abbrev', argumentList(5, 'hello world')); // "he..."
 * ```
 */
export function createStringsExtension(
  config: StringsConfig = {}
): ExtensionResult & Record<StringFunctionName, HostFunction> {
  const random = config.random ?? cryptoRandomSource;

  /** One-string-in, one-string-out function */
  const unary = (description: string, fn: (s: string) => string): HostFunction =>
    defineFunction({
      params: params().string('s'),
      returns: types.string,
      fn: (s) => ok(fn(s)),
      description,
    });

  /** Needle-first string predicate */
  const predicate = (
    description: string,
    fn: (s: string, needle: string) => boolean
  ): HostFunction =>
    defineFunction({
      params: params().string('substr').string('s'),
      returns: types.bool,
      fn: (substr, s) => ok(fn(s, substr)),
      description,
    });

  const generator = (description: string, alphabet: string): HostFunction =>
    defineFunction({
      params: params().uint('count', 'Number of characters'),
      returns: types.string,
      fn: (count) => ok(randomString(random, alphabet, count)),
      description,
    });

  return {
    base64encode: defineFunction({
      params: params().string('s'),
      returns: types.string,
      fn: base64Encode,
      description: 'Base 64 encode a string',
    }),
    base64decode: defineFunction({
      params: params().string('s'),
      returns: types.string,
      fn: base64Decode,
      description: 'Base 64 decode a string',
    }),
    base32encode: defineFunction({
      params: params().string('s'),
      returns: types.string,
      fn: base32Encode,
      description: 'Base 32 encode a string',
    }),
    base32decode: defineFunction({
      params: params().string('s'),
      returns: types.string,
      fn: base32Decode,
      description: 'Base 32 decode a string',
    }),

    abbrev: defineFunction({
      params: params().int('width', 'Maximum width in bytes').string('s'),
      returns: types.string,
      fn: (width, s) => ok(abbrev(width, s)),
      description: 'Truncate a string with ellipses: abbrev 5 "hello world" yields "he..."',
    }),
    abbrevboth: defineFunction({
      params: params()
        .int('left', 'Bytes to skip from the start')
        .int('right', 'Maximum width in bytes')
        .string('s'),
      returns: types.string,
      fn: (left, right, s) => ok(abbrevboth(left, right, s)),
      description: 'Abbreviate from both sides, yielding "...lo wo..."',
    }),
    trunc: defineFunction({
      params: params().int('len').string('s'),
      returns: types.string,
      fn: (len, s) => ok(trunc(len, s)),
      description: 'Truncate a string without suffix: trunc 5 "Hello World" yields "Hello"',
    }),
    substring: defineFunction({
      params: params()
        .int('start', 'Start byte offset')
        .int('end', 'End byte offset (exclusive); negative for end of string')
        .string('s'),
      returns: types.string,
      fn: (start, end, s) => ok(substring(start, end, s)),
      description: 'Bytes between two offsets; the string unchanged when out of range',
    }),

    initials: unary('Initials of a multi-word string: "Matt Butcher" yields "MB"', initials),
    untitle: unary('Remove title casing', untitle),
    trim: unary('Remove leading and trailing whitespace', trimWhitespace),

    randAlphaNum: generator('Random alphanumeric string of the given length', ALPHABETS.alphaNumeric),
    randAlpha: generator('Random alphabetic string of the given length', ALPHABETS.alpha),
    randAscii: generator('Random printable ASCII string (symbols included)', ALPHABETS.ascii),
    randNumeric: generator('Random string of digits of the given length', ALPHABETS.numeric),

    replace: defineFunction({
      params: params().string('old').string('new').string('s'),
      returns: types.string,
      fn: (search, replacement, s) => ok(replaceAll(search, replacement, s)),
      description: 'Replace every occurrence of old with new',
    }),
    plural: defineFunction({
      params: params().string('one').string('many').int('count'),
      returns: types.string,
      fn: (one, many, count) => ok(count === 1 ? one : many),
      description: 'Singular form when count is 1, plural form otherwise',
    }),
    join: defineFunction({
      params: params().string('sep').value('list', 'Array of values'),
      returns: types.string,
      fn: (sep, list) =>
        list.kind === 'array'
          ? ok(joinValues(sep, list.elements))
          : err('second argument must be of type Array'),
      description: 'Join array elements with a separator: join SEP ARRAY',
    }),
    split: defineFunction({
      params: params().string('sep').string('s'),
      returns: types.stringMap,
      fn: (sep, s) => ok(splitToMap(sep, s)),
      description:
        'Split a string into a map keyed _0, _1, ...: {{$v := "foo/bar" | split "/"}}{{$v._0}} prints foo',
    }),

    trimAll: defineFunction({
      params: params().string('chars', 'Characters to strip').string('s'),
      returns: types.string,
      fn: (chars, s) => ok(trimChars(chars, s)),
      description: 'Strip the given characters from both ends: trimAll "$" "$5.00"',
    }),
    trimSuffix: defineFunction({
      params: params().string('suffix').string('s'),
      returns: types.string,
      fn: (suffix, s) => ok(trimSuffix(suffix, s)),
      description: 'Remove a suffix once: trimSuffix "-" "ends-with-"',
    }),
    trimPrefix: defineFunction({
      params: params().string('prefix').string('s'),
      returns: types.string,
      fn: (prefix, s) => ok(trimPrefix(prefix, s)),
      description: 'Remove a prefix once: trimPrefix "$" "$5"',
    }),

    contains: predicate('Whether s contains substr', (s, substr) => s.includes(substr)),
    hasSuffix: predicate('Whether s ends with substr', (s, substr) => s.endsWith(substr)),
    hasPrefix: predicate('Whether s starts with substr', (s, substr) => s.startsWith(substr)),
  };
}
