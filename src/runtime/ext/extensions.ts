import { createError } from '../../error-classes.js';
import type { HostFunction } from '../core/callable.js';
import type { ExtensionEvent, ObservabilityCallbacks } from '../core/types.js';

/**
 * Result object returned by extension factories.
 * Maps function names to adapted host functions.
 */
export type ExtensionResult = Record<string, HostFunction>;

/**
 * Factory function contract for creating extensions.
 * Accepts typed configuration and returns isolated instance.
 */
export type ExtensionFactory<TConfig> = (config: TConfig) => ExtensionResult;

/** Namespaces accepted by prefixFunctions, config files and the function table */
export const NAMESPACE_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Prefix all function names in an extension with a namespace.
 *
 * @param namespace - Alphanumeric string with underscores/hyphens (e.g., "str")
 * @returns New ExtensionResult with prefixed function names (namespace::functionName)
 * @throws {RegistrationError} STRAND-R003 if namespace is invalid
 *
 * @example
 * ```typescript
 * const prefixed = prefixFunctions('str', createStringsExtension());
 * // { "str::trim": ..., "str::split": ... }
 * ```
 */
export function prefixFunctions(
  namespace: string,
  functions: ExtensionResult
): ExtensionResult {
  if (!NAMESPACE_PATTERN.test(namespace)) {
    throw createError('STRAND-R003', { namespace });
  }

  const result: ExtensionResult = {};
  for (const [name, definition] of Object.entries(functions)) {
    result[`${namespace}::${name}`] = definition;
  }
  return result;
}

/**
 * Emit an extension event with auto-generated timestamp.
 * Adds ISO timestamp if event.timestamp is undefined, then calls onLogEvent.
 *
 * @throws {Error} If event.event is missing or empty
 *
 * @example
 * ```typescript
 * emitExtensionEvent(callbacks, {
 *   event: 'extension_registered',
 *   subsystem: 'extension:strings',
 *   details: { functions: 25 },
 * });
 * ```
 */
export function emitExtensionEvent(
  callbacks: ObservabilityCallbacks,
  event: Omit<ExtensionEvent, 'timestamp'> & { timestamp?: string | undefined }
): void {
  if (event.event.trim() === '') {
    throw new Error('Event must include non-empty event field');
  }

  if (callbacks.onLogEvent !== undefined) {
    callbacks.onLogEvent({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    });
  }
}
