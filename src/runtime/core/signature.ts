/**
 * Value Types and Signatures
 *
 * A ValueType converts between one template value variant and one
 * static TypeScript type. A Signature is an ordered list of typed
 * parameters; each builder call appends a parameter and extends the
 * static argument tuple, so the decoded arguments line up with the
 * host function's own parameter list.
 */

import { BindError } from '../../error-classes.js';
import type { ArgumentList } from './opaque.js';
import { err, ok, type Result } from './result.js';
import {
  array,
  bool,
  float,
  int,
  map,
  str,
  type TemplateValue,
} from './values.js';

// ============================================================
// VALUE TYPES
// ============================================================

/**
 * Conversion between template values and a static type.
 * `convert` returns undefined when the variant is not accepted;
 * `wrap` returns undefined when the value has no template form.
 */
export interface ValueType<T> {
  readonly name: string;
  convert(value: TemplateValue): T | undefined;
  wrap(value: T): TemplateValue | undefined;
}

/** Int and float variants, truncated toward zero; undefined outside the safe range */
function toInteger(value: TemplateValue): number | undefined {
  if (value.kind === 'int') return value.value;
  if (value.kind !== 'float' || !Number.isFinite(value.value)) return undefined;

  const truncated = Math.trunc(value.value);
  if (!Number.isSafeInteger(truncated)) return undefined;
  // -0 from truncating small negative floats
  return truncated === 0 ? 0 : truncated;
}

const stringType: ValueType<string> = {
  name: 'string',
  convert: (value) => (value.kind === 'string' ? value.value : undefined),
  wrap: str,
};

const intType: ValueType<number> = {
  name: 'int',
  convert: toInteger,
  wrap: (value) => (Number.isSafeInteger(value) ? int(value) : undefined),
};

const uintType: ValueType<number> = {
  name: 'uint',
  convert: (value) => {
    const n = toInteger(value);
    return n !== undefined && n >= 0 ? n : undefined;
  },
  wrap: (value) => (Number.isSafeInteger(value) && value >= 0 ? int(value) : undefined),
};

const floatType: ValueType<number> = {
  name: 'float',
  convert: (value) =>
    value.kind === 'int' || value.kind === 'float' ? value.value : undefined,
  wrap: float,
};

const boolType: ValueType<boolean> = {
  name: 'bool',
  convert: (value) => (value.kind === 'bool' ? value.value : undefined),
  wrap: bool,
};

const stringMapType: ValueType<Map<string, string>> = {
  name: 'map<string, string>',
  convert: (value) => {
    if (value.kind !== 'map') return undefined;
    const result = new Map<string, string>();
    for (const [key, entry] of value.entries) {
      if (entry.kind !== 'string') return undefined;
      result.set(key, entry.value);
    }
    return result;
  },
  wrap: (value) =>
    map(Array.from(value, ([key, entry]): [string, TemplateValue] => [key, str(entry)])),
};

const listType: ValueType<readonly TemplateValue[]> = {
  name: 'array',
  convert: (value) => (value.kind === 'array' ? value.elements : undefined),
  wrap: array,
};

const anyType: ValueType<TemplateValue> = {
  name: 'any',
  convert: (value) => value,
  wrap: (value) => value,
};

/** Built-in value types, usable as parameter and return types */
export const types = {
  string: stringType,
  int: intType,
  uint: uintType,
  float: floatType,
  bool: boolType,
  stringMap: stringMapType,
  list: listType,
  value: anyType,
} as const;

// ============================================================
// SIGNATURES
// ============================================================

/** Parameter metadata, in declaration order */
export interface ParamMetadata {
  readonly name: string;
  readonly type: string;
  readonly description: string;
}

type Decoder<P extends unknown[]> = (
  args: ArgumentList,
  functionName: string
) => Result<P, BindError>;

/**
 * Ordered parameter declarations with their static argument tuple `P`.
 *
 * @example
 * ```typescript
 * const sig = params().int('width').string('s');
 * // Signature<[number, string]>
 * ```
 */
export class Signature<P extends unknown[]> {
  private constructor(
    readonly params: readonly ParamMetadata[],
    private readonly decoder: Decoder<P>
  ) {}

  static empty(): Signature<[]> {
    return new Signature<[]>([], () => ok<[]>([]));
  }

  get arity(): number {
    return this.params.length;
  }

  /**
   * Downcast and convert every argument, left to right.
   * Stops at the first position that fails. Does not check arity.
   */
  decode(args: ArgumentList, functionName: string): Result<P, BindError> {
    return this.decoder(args, functionName);
  }

  /** Append a parameter of any value type */
  param<T>(
    name: string,
    type: ValueType<T>,
    description = ''
  ): Signature<[...P, T]> {
    const position = this.params.length;
    const previous = this.decoder;

    return new Signature<[...P, T]>(
      [...this.params, { name, type: type.name, description }],
      (args, functionName) => {
        const head = previous(args, functionName);
        if (!head.ok) return head;

        const value = args[position]?.downcast();
        if (value === undefined) {
          return err(BindError.downcast(functionName, position, name));
        }

        const converted = type.convert(value);
        if (converted === undefined) {
          return err(
            BindError.convert(functionName, position, name, type.name, value.kind)
          );
        }

        const values: [...P, T] = [...head.value, converted];
        return ok(values);
      }
    );
  }

  string(name: string, description?: string): Signature<[...P, string]> {
    return this.param(name, types.string, description);
  }

  int(name: string, description?: string): Signature<[...P, number]> {
    return this.param(name, types.int, description);
  }

  uint(name: string, description?: string): Signature<[...P, number]> {
    return this.param(name, types.uint, description);
  }

  float(name: string, description?: string): Signature<[...P, number]> {
    return this.param(name, types.float, description);
  }

  bool(name: string, description?: string): Signature<[...P, boolean]> {
    return this.param(name, types.bool, description);
  }

  stringMap(
    name: string,
    description?: string
  ): Signature<[...P, Map<string, string>]> {
    return this.param(name, types.stringMap, description);
  }

  list(
    name: string,
    description?: string
  ): Signature<[...P, readonly TemplateValue[]]> {
    return this.param(name, types.list, description);
  }

  value(name: string, description?: string): Signature<[...P, TemplateValue]> {
    return this.param(name, types.value, description);
  }
}

/** Start an empty signature */
export function params(): Signature<[]> {
  return Signature.empty();
}
