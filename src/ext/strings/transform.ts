/**
 * Case, replacement, splitting, joining and trimming.
 */

import { formatValue, type TemplateValue } from '../../runtime/core/values.js';
import { sliceBytes } from './bytes.js';

// Unicode White_Space; unlike \s it excludes U+FEFF
const WHITESPACE = /\p{White_Space}/u;
const WHITESPACE_RUN = /\p{White_Space}+/u;
const SURROUNDING_WHITESPACE = /^\p{White_Space}+|\p{White_Space}+$/gu;

/** First byte of each whitespace-separated word */
export function initials(s: string): string {
  return s
    .split(WHITESPACE_RUN)
    .filter((word) => word.length > 0)
    .map((word) => sliceBytes(word, 0, 1))
    .join('');
}

/** `s` without leading and trailing whitespace */
export function trimWhitespace(s: string): string {
  return s.replace(SURROUNDING_WHITESPACE, '');
}

/**
 * Lower-case the first character of every word, leaving the rest as is.
 *
 * @example untitle('FOO BAR') // "fOO bAR"
 */
export function untitle(s: string): string {
  let atWordStart = true;
  let result = '';
  for (const ch of s) {
    if (WHITESPACE.test(ch)) {
      atWordStart = true;
      result += ch;
    } else if (atWordStart) {
      atWordStart = false;
      result += ch.toLowerCase();
    } else {
      result += ch;
    }
  }
  return result;
}

/**
 * Replace every non-overlapping occurrence of `search`.
 * An empty `search` matches before every code point and at the end.
 */
export function replaceAll(search: string, replacement: string, s: string): string {
  if (search === '') {
    const chars = Array.from(s);
    if (chars.length === 0) return replacement;
    return replacement + chars.join(replacement) + replacement;
  }
  return s.split(search).join(replacement);
}

/**
 * Split on every occurrence of `sep`.
 * An empty separator yields an empty first and last piece around every
 * code point, so that joining the pieces with "" restores `s`.
 */
export function splitAll(sep: string, s: string): string[] {
  if (sep === '') {
    return ['', ...Array.from(s), ''];
  }
  return s.split(sep);
}

/** Pieces of `s` keyed `_0`, `_1`, ... in split order */
export function splitToMap(sep: string, s: string): Map<string, string> {
  return new Map(splitAll(sep, s).map((piece, i): [string, string] => [`_${i}`, piece]));
}

/** Display forms of `elements` separated by `sep` */
export function joinValues(sep: string, elements: readonly TemplateValue[]): string {
  return elements.map(formatValue).join(sep);
}

/** Strip leading and trailing code points that occur in `chars` */
export function trimChars(chars: string, s: string): string {
  const cutset = new Set(Array.from(chars));
  const codePoints = Array.from(s);

  let start = 0;
  let end = codePoints.length;
  while (start < end && cutset.has(codePoints[start] ?? '')) start++;
  while (end > start && cutset.has(codePoints[end - 1] ?? '')) end--;

  return codePoints.slice(start, end).join('');
}

/** Remove one trailing `suffix`, if present */
export function trimSuffix(suffix: string, s: string): string {
  return suffix !== '' && s.endsWith(suffix) ? s.slice(0, s.length - suffix.length) : s;
}

/** Remove one leading `prefix`, if present */
export function trimPrefix(prefix: string, s: string): string {
  return prefix !== '' && s.startsWith(prefix) ? s.slice(prefix.length) : s;
}
