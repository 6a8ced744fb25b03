/**
 * Base-64 and base-32 codecs (RFC 4648 alphabets, `=` padding).
 */

import { base32, base64 } from 'rfc4648';
import type { HostResult } from '../../runtime/core/callable.js';
import { err, ok } from '../../runtime/core/result.js';
import { decodeUtf8, encodeUtf8 } from './bytes.js';

interface Codec {
  parse(input: string): Uint8Array;
  stringify(data: ArrayLike<number>): string;
}

function encodeWith(codec: Codec, s: string): HostResult<string> {
  return ok(codec.stringify(encodeUtf8(s)));
}

function decodeWith(codec: Codec, s: string): HostResult<string> {
  let bytes: Uint8Array;
  try {
    bytes = codec.parse(s);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(`unable to decode ${reason}`);
  }
  return decodeUtf8(bytes);
}

export function base64Encode(s: string): HostResult<string> {
  return encodeWith(base64, s);
}

export function base64Decode(s: string): HostResult<string> {
  return decodeWith(base64, s);
}

export function base32Encode(s: string): HostResult<string> {
  return encodeWith(base32, s);
}

export function base32Decode(s: string): HostResult<string> {
  return decodeWith(base32, s);
}
