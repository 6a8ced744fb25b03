/**
 * Function Table
 *
 * The registration surface consumed by a template engine: function
 * names mapped to adapted host functions, called by name with an
 * argument list.
 */

import { BindError, createError } from '../../error-classes.js';
import type { ExtensionResult } from '../ext/extensions.js';
import {
  emitExtensionEvent,
  NAMESPACE_PATTERN,
  prefixFunctions,
} from '../ext/extensions.js';
import type { CallResult, HostFunction } from './callable.js';
import { describeFunction, type FunctionMetadata } from './introspection.js';
import type { ArgumentList } from './opaque.js';
import { err } from './result.js';
import type { ObservabilityCallbacks } from './types.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** An identifier, optionally prefixed by `namespace::` segments */
function isValidFunctionName(name: string): boolean {
  const segments = name.split('::');
  const base = segments.pop() ?? '';
  return (
    IDENTIFIER_PATTERN.test(base) &&
    segments.every((segment) => NAMESPACE_PATTERN.test(segment))
  );
}

/** Options for creating a function table */
export interface FunctionTableOptions {
  /** Observability callbacks for monitoring calls */
  observability?: ObservabilityCallbacks | undefined;
}

export class FunctionTable {
  private readonly functions = new Map<string, HostFunction>();
  private readonly observability: ObservabilityCallbacks;

  constructor(options: FunctionTableOptions = {}) {
    this.observability = options.observability ?? {};
  }

  /**
   * Register a host function under `name`.
   * @throws {RegistrationError} STRAND-R001 invalid name, STRAND-R002 duplicate
   */
  register(name: string, fn: HostFunction): this {
    if (!isValidFunctionName(name)) {
      throw createError('STRAND-R001', { functionName: name });
    }
    if (this.functions.has(name)) {
      throw createError('STRAND-R002', { functionName: name });
    }
    this.functions.set(name, fn);
    return this;
  }

  /**
   * Register every function of an extension, optionally under a namespace.
   * Emits an `extension_registered` log event naming `subsystem`.
   */
  registerAll(
    extension: ExtensionResult,
    options: { namespace?: string | undefined; subsystem?: string | undefined } = {}
  ): this {
    const functions =
      options.namespace !== undefined
        ? prefixFunctions(options.namespace, extension)
        : extension;

    const names = Object.keys(functions);
    for (const name of names) {
      const fn = functions[name];
      if (fn !== undefined) this.register(name, fn);
    }

    emitExtensionEvent(this.observability, {
      event: 'extension_registered',
      subsystem: options.subsystem ?? 'extension',
      details: { namespace: options.namespace, functions: names },
    });
    return this;
  }

  unregister(name: string): boolean {
    return this.functions.delete(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  get(name: string): HostFunction | undefined {
    return this.functions.get(name);
  }

  /** Registered names, sorted */
  names(): string[] {
    return Array.from(this.functions.keys()).sort();
  }

  /** Metadata of every registered function, sorted by name */
  describe(): FunctionMetadata[] {
    return this.names().flatMap((name) => {
      const fn = this.functions.get(name);
      return fn === undefined ? [] : [describeFunction(name, fn)];
    });
  }

  /**
   * Call a function by name.
   * Failures are returned, including an unknown name (kind "lookup").
   */
  call(name: string, args: ArgumentList): CallResult {
    const { onHostCall, onFunctionReturn, onError } = this.observability;

    const fn = this.functions.get(name);
    if (fn === undefined) {
      const error = BindError.lookup(name);
      onError?.({ name, error });
      return err(error);
    }

    onHostCall?.({ name, args });
    const startTime = performance.now();
    const result = fn.call(args, name);

    if (result.ok) {
      onFunctionReturn?.({
        name,
        value: result.value,
        durationMs: performance.now() - startTime,
      });
    } else {
      onError?.({ name, error: result.error });
    }
    return result;
  }
}
