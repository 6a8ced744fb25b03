/**
 * Strand Tests: Default Function Table
 * createFunctionTable() with namespace, exclusions and aliases
 */

import { describe, expect, it } from 'vitest';
import {
  argumentList,
  createFunctionTable,
  formatSignature,
  parseConfig,
  RegistrationError,
  STRING_FUNCTION_NAMES,
  type ExtensionEvent,
} from '../src/index.js';
import { callBool, callString } from './helpers/call.js';

describe('Strand: createFunctionTable', () => {
  it('registers every string function without a prefix', () => {
    const table = createFunctionTable();
    expect(table.names()).toEqual([...STRING_FUNCTION_NAMES].sort());
    expect(table.names()).toHaveLength(25);
  });

  it('documents every function', () => {
    for (const metadata of createFunctionTable().describe()) {
      expect(metadata.description).not.toBe('');
    }
  });

  it('describes signatures', () => {
    const abbrev = createFunctionTable()
      .describe()
      .find((m) => m.name === 'abbrev');
    expect(abbrev && formatSignature(abbrev)).toBe('abbrev(width: int, s: string) -> string');
  });

  it('registers under a namespace', () => {
    const table = createFunctionTable({ config: parseConfig('namespace: str') });
    expect(table.has('abbrev')).toBe(false);
    expect(callString(table, 'str::abbrev', 4, 'foobar')).toBe('f...');
  });

  it('registers under a namespace with a hyphen', () => {
    const table = createFunctionTable({ config: parseConfig('namespace: my-ns') });
    expect(callString(table, 'my-ns::trim', ' x ')).toBe('x');
  });

  it('leaves out excluded functions', () => {
    const table = createFunctionTable({
      config: parseConfig('exclude: [randAscii, randAlpha]'),
    });
    expect(table.has('randAscii')).toBe(false);
    expect(table.names()).toHaveLength(23);

    const result = table.call('randAscii', argumentList(3));
    expect(result.ok ? undefined : result.error.kind).toBe('lookup');
  });

  it('registers aliases, inside the namespace', () => {
    const table = createFunctionTable({
      config: parseConfig('namespace: str\naliases:\n  startsWith: hasPrefix\n'),
    });
    expect(callBool(table, 'str::startsWith', 'foo', 'foobar')).toBe(true);
  });

  it('drops aliases of excluded functions', () => {
    const table = createFunctionTable({
      config: parseConfig('exclude: [hasPrefix]\naliases:\n  startsWith: hasPrefix\n'),
    });
    expect(table.has('startsWith')).toBe(false);
  });

  it('rejects an alias that shadows a function', () => {
    const config = parseConfig('aliases:\n  trim: untitle\n');
    expect(() => createFunctionTable({ config })).toThrow(RegistrationError);
    expect(() => createFunctionTable({ config })).toThrow(
      'Function trim is already registered'
    );
  });

  it('logs registration of the extension', () => {
    const events: ExtensionEvent[] = [];
    createFunctionTable({
      observability: { onLogEvent: (event) => events.push(event) },
    });
    expect(events).toHaveLength(1);
    expect(events[0]?.subsystem).toBe('extension:strings');
    expect(events[0]?.event).toBe('extension_registered');
  });
});
