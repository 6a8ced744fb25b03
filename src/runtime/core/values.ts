/**
 * Template Value Types and Utilities
 *
 * The dynamic value union every template value is expressed in.
 * Public API for host applications.
 */

/** Discriminant of a template value */
export type TemplateKind =
  | 'nil'
  | 'bool'
  | 'int'
  | 'float'
  | 'string'
  | 'array'
  | 'map';

export interface TemplateNil {
  readonly kind: 'nil';
}

export interface TemplateBool {
  readonly kind: 'bool';
  readonly value: boolean;
}

/** Integer variant; always a safe integer */
export interface TemplateInt {
  readonly kind: 'int';
  readonly value: number;
}

export interface TemplateFloat {
  readonly kind: 'float';
  readonly value: number;
}

export interface TemplateString {
  readonly kind: 'string';
  readonly value: string;
}

export interface TemplateArray {
  readonly kind: 'array';
  readonly elements: readonly TemplateValue[];
}

export interface TemplateMap {
  readonly kind: 'map';
  readonly entries: ReadonlyMap<string, TemplateValue>;
}

/** Any value that can flow through a template */
export type TemplateValue =
  | TemplateNil
  | TemplateBool
  | TemplateInt
  | TemplateFloat
  | TemplateString
  | TemplateArray
  | TemplateMap;

// ─── Constructors ────────────────────────────────────

const NIL: TemplateNil = Object.freeze({ kind: 'nil' });

export function nil(): TemplateNil {
  return NIL;
}

export function bool(value: boolean): TemplateBool {
  return Object.freeze({ kind: 'bool', value });
}

/** @throws TypeError when `value` is not a safe integer */
export function int(value: number): TemplateInt {
  if (!Number.isSafeInteger(value)) {
    throw new TypeError(`Not a safe integer: ${value}`);
  }
  return Object.freeze({ kind: 'int', value });
}

export function float(value: number): TemplateFloat {
  return Object.freeze({ kind: 'float', value });
}

export function str(value: string): TemplateString {
  return Object.freeze({ kind: 'string', value });
}

export function array(elements: Iterable<TemplateValue>): TemplateArray {
  return Object.freeze({
    kind: 'array',
    elements: Object.freeze(Array.from(elements)),
  });
}

export function map(
  entries: Iterable<readonly [string, TemplateValue]> | Record<string, TemplateValue>
): TemplateMap {
  const copy = new Map<string, TemplateValue>(
    isIterable(entries) ? entries : Object.entries(entries)
  );
  return Object.freeze({ kind: 'map', entries: copy });
}

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}

/**
 * Build a template value from plain JavaScript data.
 *
 * null/undefined become nil, integral numbers become int, other numbers
 * float. Arrays, Maps and plain objects convert recursively.
 *
 * @throws TypeError for functions, symbols, bigints and class instances
 */
export function fromNative(input: unknown): TemplateValue {
  if (input === null || input === undefined) return nil();
  if (typeof input === 'boolean') return bool(input);
  if (typeof input === 'string') return str(input);
  if (typeof input === 'number') {
    return Number.isSafeInteger(input) ? int(input) : float(input);
  }
  if (Array.isArray(input)) return array(input.map(fromNative));
  if (input instanceof Map) {
    const entries: [string, TemplateValue][] = [];
    for (const [key, value] of input) {
      if (typeof key !== 'string') {
        throw new TypeError(`Map keys must be strings, got ${typeof key}`);
      }
      entries.push([key, fromNative(value)]);
    }
    return map(entries);
  }
  if (typeof input === 'object' && Object.getPrototypeOf(input) === Object.prototype) {
    return map(
      Object.entries(input).map(([key, value]): [string, TemplateValue] => [
        key,
        fromNative(value),
      ])
    );
  }
  throw new TypeError(`Cannot convert ${typeof input} to a template value`);
}

// ─── Guards ──────────────────────────────────────────

/** Deep structural check that an unknown payload is a template value */
export function isTemplateValue(input: unknown): input is TemplateValue {
  if (typeof input !== 'object' || input === null || !('kind' in input)) {
    return false;
  }
  switch (input.kind) {
    case 'nil':
      return true;
    case 'bool':
      return 'value' in input && typeof input.value === 'boolean';
    case 'int':
      return 'value' in input && Number.isSafeInteger(input.value);
    case 'float':
      return 'value' in input && typeof input.value === 'number';
    case 'string':
      return 'value' in input && typeof input.value === 'string';
    case 'array':
      return (
        'elements' in input &&
        Array.isArray(input.elements) &&
        input.elements.every(isTemplateValue)
      );
    case 'map': {
      if (!('entries' in input) || !(input.entries instanceof Map)) return false;
      for (const [key, value] of input.entries) {
        if (typeof key !== 'string' || !isTemplateValue(value)) return false;
      }
      return true;
    }
    default:
      return false;
  }
}

export function kindOf(value: TemplateValue): TemplateKind {
  return value.kind;
}

// ─── Utilities ───────────────────────────────────────

/**
 * Display form of a value, as substituted into template output.
 * Arrays render as `[a b]`, maps as `map[k:v]` with sorted keys.
 */
export function formatValue(value: TemplateValue): string {
  switch (value.kind) {
    case 'nil':
      return '<no value>';
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'int':
    case 'float':
      return String(value.value);
    case 'string':
      return value.value;
    case 'array':
      return '[' + value.elements.map(formatValue).join(' ') + ']';
    case 'map': {
      const keys = Array.from(value.entries.keys()).sort();
      const parts = keys.map((key) => {
        const entry = value.entries.get(key);
        return `${key}:${entry === undefined ? '' : formatValue(entry)}`;
      });
      return 'map[' + parts.join(' ') + ']';
    }
  }
}
