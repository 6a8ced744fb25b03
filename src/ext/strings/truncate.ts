/**
 * Truncation and slicing. All widths and offsets count UTF-8 bytes.
 */

import { byteLength, sliceBytes } from './bytes.js';

const ELLIPSIS = '...';

/**
 * Truncate with a trailing ellipsis to exactly `width` bytes.
 * Widths below 4 leave no room for content and return `s` unchanged.
 *
 * @example abbrev(5, 'hello world') // "he..."
 */
export function abbrev(width: number, s: string): string {
  if (width < 4 || byteLength(s) < width) {
    return s;
  }
  return sliceBytes(s, 0, width - 3) + ELLIPSIS;
}

/**
 * Abbreviate from both sides: skip `left` bytes, keep the result within
 * `right` bytes. A negative bound means the whole string.
 *
 * @example abbrevboth(5, 7, 'foobarfoobar') // "...r..."
 */
export function abbrevboth(left: number, right: number, s: string): string {
  const length = byteLength(s);
  const offset = left < 0 ? length : Math.min(left, length);
  const maxWidth = right < 0 ? length : Math.min(right, length);

  if (maxWidth < 4 || (offset > 0 && maxWidth < 7) || length <= maxWidth) {
    return s;
  }
  if (offset <= 4) {
    return sliceBytes(s, 0, maxWidth - 3) + ELLIPSIS;
  }
  if (offset + maxWidth - 3 < length) {
    return ELLIPSIS + sliceBytes(s, offset, offset + maxWidth - 6) + ELLIPSIS;
  }
  return ELLIPSIS + sliceBytes(s, length - (maxWidth - 3));
}

/** First `len` bytes; `s` unchanged when `len` is negative or past the end */
export function trunc(len: number, s: string): string {
  if (len < 0 || len > byteLength(s)) {
    return s;
  }
  return sliceBytes(s, 0, len);
}

/**
 * Bytes [start, end) of `s`.
 *
 * The second bound is an end offset, not a length. A negative `start`
 * clamps to 0 and a negative `end` means the end of the string. When the
 * bounds are inverted or out of range, `s` is returned unchanged.
 */
export function substring(start: number, end: number, s: string): string {
  const length = byteLength(s);
  const from = Math.max(start, 0);
  const to = end < 0 ? length : end;

  if (from > to || from > length || to > length) {
    return s;
  }
  return sliceBytes(s, from, to);
}
