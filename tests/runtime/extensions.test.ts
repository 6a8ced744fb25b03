/**
 * Strand Runtime Tests: Extension Plumbing
 */

import { describe, expect, it } from 'vitest';
import {
  defineFunction,
  emitExtensionEvent,
  ok,
  params,
  prefixFunctions,
  RegistrationError,
  types,
  type ExtensionEvent,
  type ExtensionFactory,
} from '../../src/index.js';

const createCounterExtension: ExtensionFactory<{ start: number }> = (config) => {
  let count = config.start;
  return {
    next: defineFunction({
      params: params(),
      returns: types.int,
      fn: () => ok(count++),
    }),
  };
};

describe('Strand Runtime: Extensions', () => {
  describe('prefixFunctions', () => {
    it('prefixes every name with namespace::', () => {
      const prefixed = prefixFunctions('count', createCounterExtension({ start: 0 }));
      expect(Object.keys(prefixed)).toEqual(['count::next']);
    });

    it('rejects invalid namespaces with a registration error', () => {
      expect(() => prefixFunctions('bad ns', {})).toThrow(
        'Invalid namespace bad ns: use letters, digits, "_" or "-"'
      );
      expect(() => prefixFunctions('', {})).toThrow(RegistrationError);
    });

    it('accepts hyphens and digits', () => {
      const prefixed = prefixFunctions('my-ns2', createCounterExtension({ start: 0 }));
      expect(Object.keys(prefixed)).toEqual(['my-ns2::next']);
    });
  });

  it('extension instances keep separate state', () => {
    const a = createCounterExtension({ start: 0 });
    const b = createCounterExtension({ start: 10 });
    a['next']?.call([]);
    const fromA = a['next']?.call([]);
    const fromB = b['next']?.call([]);
    expect(fromA?.ok && fromA.value.downcast()).toEqual({ kind: 'int', value: 1 });
    expect(fromB?.ok && fromB.value.downcast()).toEqual({ kind: 'int', value: 10 });
  });

  describe('emitExtensionEvent', () => {
    it('adds a timestamp', () => {
      const events: ExtensionEvent[] = [];
      emitExtensionEvent(
        { onLogEvent: (event) => events.push(event) },
        { event: 'ready', subsystem: 'extension:test' }
      );
      expect(events).toHaveLength(1);
      expect(Number.isNaN(Date.parse(events[0]?.timestamp ?? ''))).toBe(false);
    });

    it('keeps a given timestamp', () => {
      const events: ExtensionEvent[] = [];
      emitExtensionEvent(
        { onLogEvent: (event) => events.push(event) },
        { event: 'ready', subsystem: 'extension:test', timestamp: '2024-01-01T00:00:00.000Z' }
      );
      expect(events[0]?.timestamp).toBe('2024-01-01T00:00:00.000Z');
    });

    it('rejects an empty event name', () => {
      expect(() => emitExtensionEvent({}, { event: ' ', subsystem: 'x' })).toThrow(
        'Event must include non-empty event field'
      );
    });

    it('does nothing without a callback', () => {
      expect(() => emitExtensionEvent({}, { event: 'ready', subsystem: 'x' })).not.toThrow();
    });
  });
});
