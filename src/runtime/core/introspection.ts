/**
 * Introspection API
 *
 * Lets host applications discover registered functions and their signatures.
 */

import type { HostFunction } from './callable.js';
import type { ParamMetadata } from './signature.js';

/**
 * Metadata describing a function's signature and documentation.
 */
export interface FunctionMetadata {
  /** Function name (including namespace if applicable, e.g., "str::trim") */
  readonly name: string;
  /** Human-readable description of what the function does */
  readonly description: string;
  /** Parameter metadata in declaration order */
  readonly params: readonly ParamMetadata[];
  /** Return type name */
  readonly returnType: string;
}

export function describeFunction(name: string, fn: HostFunction): FunctionMetadata {
  return {
    name,
    description: fn.description,
    params: fn.params.map((p) => ({ ...p })),
    returnType: fn.returnType,
  };
}

/**
 * One-line signature for documentation and error hints.
 *
 * @example
 * formatSignature(describeFunction('abbrev', abbrev))
 * // "abbrev(width: int, s: string) -> string"
 */
export function formatSignature(metadata: FunctionMetadata): string {
  const params = metadata.params.map((p) => `${p.name}: ${p.type}`).join(', ');
  return `${metadata.name}(${params}) -> ${metadata.returnType}`;
}
