/**
 * Strand Runtime Tests: Binding Adapter
 * defineFunction call sequence and every BindError kind
 */

import { describe, expect, it, vi } from 'vitest';
import {
  argumentList,
  defineFunction,
  err,
  ok,
  OpaqueValue,
  params,
  str,
  types,
  type HostResult,
} from '../../src/index.js';

function sliceBody(len: number, s: string): HostResult<string> {
  return len > s.length ? err(`length ${len} exceeds input`) : ok(s.slice(0, len));
}

const slice = defineFunction({
  params: params().int('len').string('s'),
  returns: types.string,
  fn: sliceBody,
  description: 'First len characters',
});

describe('Strand Runtime: Binding Adapter', () => {
  it('exposes declared metadata', () => {
    expect(slice.params.map((p) => p.name)).toEqual(['len', 's']);
    expect(slice.returnType).toBe('string');
    expect(slice.description).toBe('First len characters');
  });

  it('wraps the return value into an opaque value', () => {
    const result = slice.call(argumentList(3, 'hello'), 'slice');
    expect(result.ok && result.value.downcast()).toEqual(str('hel'));
  });

  it('supports functions without parameters', () => {
    const constant = defineFunction({
      params: params(),
      returns: types.string,
      fn: () => ok('x'),
    });
    const result = constant.call([], 'constant');
    expect(result.ok && result.value.equals(OpaqueValue.wrap(str('x')))).toBe(true);
    expect(constant.description).toBe('');
    expect(constant.call(argumentList(1), 'constant').ok).toBe(false);
  });

  describe('errors', () => {
    it('arity: wrong argument count', () => {
      const result = slice.call(argumentList(3), 'slice');
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('arity');
      expect(result.error.errorId).toBe('STRAND-B001');
      expect(result.error.message).toBe('Function slice expects 2 arguments, got 1');
      expect(result.error.context).toEqual({
        functionName: 'slice',
        expected: 2,
        actual: 1,
      });
    });

    it('downcast: foreign payload', () => {
      const result = slice.call([OpaqueValue.erase(new Date(0)), OpaqueValue.wrap(str('x'))]);
      expect(result.ok ? undefined : result.error.kind).toBe('downcast');
      expect(result.ok ? undefined : result.error.errorId).toBe('STRAND-B002');
    });

    it('convert: wrong variant', () => {
      const result = slice.call(argumentList('3', 'hello'), 'slice');
      expect(result.ok ? undefined : result.error.kind).toBe('convert');
      expect(result.ok ? undefined : result.error.message).toBe(
        'Function slice: argument 1 (len) expects int, got string'
      );
    });

    it('domain: function body rejects its input, message kept verbatim', () => {
      const result = slice.call(argumentList(9, 'hello'), 'slice');
      expect(result.ok ? undefined : result.error.kind).toBe('domain');
      expect(result.ok ? undefined : result.error.errorId).toBe('STRAND-B004');
      expect(result.ok ? undefined : result.error.message).toBe('length 9 exceeds input');
    });

    it('convert: return value outside the return type', () => {
      const half = defineFunction({
        params: params().int('n'),
        returns: types.int,
        fn: (n) => ok(n / 2),
      });
      const result = half.call(argumentList(3), 'half');
      expect(result.ok ? undefined : result.error.kind).toBe('convert');
      expect(result.ok ? undefined : result.error.errorId).toBe('STRAND-B006');
      expect(result.ok ? undefined : result.error.message).toBe(
        'Function half returned 1.5, which is not a valid int'
      );
      expect(half.call(argumentList(4), 'half').ok).toBe(true);
    });

    it('convert: negative return value for uint', () => {
      const negative = defineFunction({
        params: params(),
        returns: types.uint,
        fn: () => ok(-1),
      });
      const result = negative.call([], 'negative');
      expect(result.ok ? undefined : result.error.message).toBe(
        'Function negative returned -1, which is not a valid uint'
      );
    });

    it('labels errors "anonymous" when no name is given', () => {
      const result = slice.call(argumentList());
      expect(result.ok ? undefined : result.error.functionName).toBe('anonymous');
    });

    it('does not invoke the body when binding fails', () => {
      const body = vi.fn((n: number): HostResult<number> => ok(n));
      const fn = defineFunction({ params: params().int('n'), returns: types.int, fn: body });

      fn.call(argumentList('x'), 'fn');
      fn.call(argumentList(1, 2), 'fn');
      expect(body).not.toHaveBeenCalled();

      fn.call(argumentList(5), 'fn');
      expect(body).toHaveBeenCalledWith(5);
    });
  });

  it('returns results instead of throwing', () => {
    expect(() => slice.call(argumentList(true, null, 3), 'slice')).not.toThrow();
  });
});
