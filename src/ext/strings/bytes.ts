/**
 * UTF-8 byte helpers.
 *
 * Offsets in the string library are byte offsets into the UTF-8
 * encoding. Slicing through a multi-byte sequence decodes the partial
 * bytes as U+FFFD; on ASCII input bytes and characters coincide.
 */

import { err, ok } from '../../runtime/core/result.js';
import type { HostResult } from '../../runtime/core/callable.js';

export function byteLength(s: string): number {
  return Buffer.byteLength(s, 'utf8');
}

/** Bytes [start, end) of the UTF-8 encoding of `s`, decoded back to a string */
export function sliceBytes(s: string, start: number, end?: number): string {
  return Buffer.from(s, 'utf8').subarray(start, end).toString('utf8');
}

export function encodeUtf8(s: string): Uint8Array {
  return Buffer.from(s, 'utf8');
}

// ignoreBOM keeps a leading U+FEFF in the output
const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Decode bytes, failing on any invalid UTF-8 sequence */
export function decodeUtf8(bytes: Uint8Array): HostResult<string> {
  try {
    return ok(strictDecoder.decode(bytes));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(`unable to decode: ${reason}`);
  }
}
