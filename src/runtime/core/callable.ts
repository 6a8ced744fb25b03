/**
 * Host Functions
 *
 * The binding adapter: turns a statically typed function into a
 * uniformly shaped callable over opaque arguments.
 *
 * Call sequence:
 * 1. arity check
 * 2. per position: downcast, then conversion to the parameter type
 * 3. invocation; an error result becomes a domain BindError
 * 4. the return value is wrapped back into an OpaqueValue; a value
 *    outside the return type (e.g. 1.5 for int) is a convert BindError
 *
 * The first failure is returned. Arguments are never mutated.
 */

import { BindError } from '../../error-classes.js';
import { OpaqueValue, type ArgumentList } from './opaque.js';
import { err, ok, type Result } from './result.js';
import type { ParamMetadata, Signature, ValueType } from './signature.js';

/** What a host function body returns: a value, or an error message */
export type HostResult<R> = Result<R, string>;

/** What every adapted call returns */
export type CallResult = Result<OpaqueValue, BindError>;

/**
 * Statically typed function definition.
 *
 * `fn` receives converted arguments matching `params` position by
 * position, and reports domain failures with `err(message)`.
 */
export interface FunctionDefinition<P extends unknown[], R> {
  readonly params: Signature<P>;
  readonly returns: ValueType<R>;
  readonly fn: (...args: P) => HostResult<R>;
  /** Human-readable function description (optional) */
  readonly description?: string | undefined;
}

/** Type-erased host function, as stored in a function table */
export interface HostFunction {
  readonly params: readonly ParamMetadata[];
  readonly returnType: string;
  readonly description: string;
  /**
   * Invoke with opaque arguments.
   * `functionName` only labels errors; defaults to "anonymous".
   */
  call(args: ArgumentList, functionName?: string): CallResult;
}

/**
 * Adapt a statically typed function to the opaque calling convention.
 *
 * @example
 * ```typescript
 * const trunc = defineFunction({
 *   params: params().int('len').string('s'),
 *   returns: types.string,
 *   fn: (len, s) => ok(s.slice(0, len)),
 * });
 * trunc.call(argumentList(3, 'hello'), 'trunc');
 * // { ok: true, value: OpaqueValue(str('hel')) }
 * ```
 */
export function defineFunction<P extends unknown[], R>(
  definition: FunctionDefinition<P, R>
): HostFunction {
  const { params: signature, returns, fn } = definition;

  return {
    params: signature.params,
    returnType: returns.name,
    description: definition.description ?? '',
    call(args: ArgumentList, functionName = 'anonymous'): CallResult {
      if (args.length !== signature.arity) {
        return err(BindError.arity(functionName, signature.arity, args.length));
      }

      const decoded = signature.decode(args, functionName);
      if (!decoded.ok) return decoded;

      const result = fn(...decoded.value);
      if (!result.ok) {
        return err(BindError.domain(functionName, result.error));
      }

      const wrapped = returns.wrap(result.value);
      if (wrapped === undefined) {
        return err(
          BindError.returnValue(functionName, returns.name, String(result.value))
        );
      }
      return ok(OpaqueValue.wrap(wrapped));
    },
  };
}
