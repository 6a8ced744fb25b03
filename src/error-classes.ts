/**
 * Strand Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface StrandErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up the error definition, renders its message template with
 * context, and creates the error class matching the definition's category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('STRAND-R002', { functionName: 'trim' })
 * // RegistrationError: "Function trim is already registered"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): StrandError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'registration':
      return new RegistrationError(errorId, message, context);
    case 'config':
      return new ConfigError(errorId, message, context);
    case 'bind':
      return new StrandError({ errorId, message, context });
  }
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Strand errors.
 * Provides structured data for host applications to format as needed.
 */
export class StrandError extends Error {
  readonly errorId: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: StrandErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'StrandError';
    this.errorId = data.errorId;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): StrandErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: StrandErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `${this.errorId}: ${this.message}`;
  }
}

/** Validate that an errorId exists and belongs to the expected category */
function assertCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

// ============================================================
// BINDING ERRORS
// ============================================================

/** Why a call through the binding adapter could not complete */
export type BindErrorKind = 'arity' | 'downcast' | 'convert' | 'domain' | 'lookup';

const BIND_ERROR_IDS: Record<BindErrorKind, string> = {
  arity: 'STRAND-B001',
  downcast: 'STRAND-B002',
  convert: 'STRAND-B003',
  domain: 'STRAND-B004',
  lookup: 'STRAND-B005',
};

/** Convert failure on the return value rather than an argument */
const RETURN_VALUE_ERROR_ID = 'STRAND-B006';

/**
 * Failure reported by the binding adapter.
 *
 * Bind errors are returned as values (see `CallResult`), never thrown
 * by the adapter. The `kind` discriminates the failure; `context`
 * carries the function name and the position-specific details.
 */
export class BindError extends StrandError {
  readonly kind: BindErrorKind;
  readonly functionName: string;

  private constructor(
    kind: BindErrorKind,
    functionName: string,
    context: Record<string, unknown>,
    errorId = BIND_ERROR_IDS[kind]
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    const fullContext = { functionName, ...context };
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, fullContext),
      context: fullContext,
    });
    this.name = 'BindError';
    this.kind = kind;
    this.functionName = functionName;
  }

  /** Argument count differs from the declared arity */
  static arity(functionName: string, expected: number, actual: number): BindError {
    return new BindError('arity', functionName, { expected, actual });
  }

  /** Opaque handle at `position` (0-based) holds no template value */
  static downcast(
    functionName: string,
    position: number,
    paramName: string
  ): BindError {
    return new BindError('downcast', functionName, {
      position,
      ordinal: position + 1,
      paramName,
    });
  }

  /** Value at `position` (0-based) cannot be converted to the parameter type */
  static convert(
    functionName: string,
    position: number,
    paramName: string,
    expected: string,
    actual: string
  ): BindError {
    return new BindError('convert', functionName, {
      position,
      ordinal: position + 1,
      paramName,
      expected,
      actual,
    });
  }

  /** Function result cannot be wrapped as the declared return type */
  static returnValue(
    functionName: string,
    expected: string,
    actual: string
  ): BindError {
    return new BindError(
      'convert',
      functionName,
      { expected, actual },
      RETURN_VALUE_ERROR_ID
    );
  }

  /** Function body rejected its arguments; `message` is kept verbatim */
  static domain(functionName: string, message: string): BindError {
    return new BindError('domain', functionName, { message });
  }

  /** No function registered under the name */
  static lookup(functionName: string): BindError {
    return new BindError('lookup', functionName, {});
  }
}

// ============================================================
// REGISTRATION AND CONFIG ERRORS
// ============================================================

/** Function table registration errors (thrown) */
export class RegistrationError extends StrandError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'registration');
    super({ errorId, message, context });
    this.name = 'RegistrationError';
  }
}

/** Configuration loading errors (thrown) */
export class ConfigError extends StrandError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'config');
    super({ errorId, message, context });
    this.name = 'ConfigError';
  }
}
