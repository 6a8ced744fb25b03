/**
 * Callback and event types shared by the function table and extensions.
 */

import type { BindError } from '../../error-classes.js';
import type { ArgumentList, OpaqueValue } from './opaque.js';

/** Observability callbacks for monitoring calls */
export interface ObservabilityCallbacks {
  /** Called before a function is invoked */
  onHostCall?: ((event: HostCallEvent) => void) | undefined;
  /** Called after a function returns a value */
  onFunctionReturn?: ((event: FunctionReturnEvent) => void) | undefined;
  /** Called when a call fails */
  onError?: ((event: ErrorEvent) => void) | undefined;
  /** Called for extension lifecycle events */
  onLogEvent?: ((event: ExtensionEvent) => void) | undefined;
}

/** Event emitted before a function call */
export interface HostCallEvent {
  /** Function name */
  name: string;
  /** Arguments passed to function */
  args: ArgumentList;
}

/** Event emitted after a function returns */
export interface FunctionReturnEvent {
  /** Function name */
  name: string;
  /** Return value */
  value: OpaqueValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted when a call fails */
export interface ErrorEvent {
  /** Function name */
  name: string;
  /** The error returned to the caller */
  error: BindError;
}

/**
 * Structured event emitted by extensions.
 * `subsystem` names the emitter, e.g. "extension:strings".
 */
export interface ExtensionEvent {
  readonly event: string;
  readonly subsystem: string;
  readonly timestamp: string;
  /** Event-specific payload */
  readonly details?: Record<string, unknown> | undefined;
}
