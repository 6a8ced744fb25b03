/**
 * Default function table: the strings extension registered according
 * to configuration.
 */

import type { StrandConfig } from './config.js';
import { createError } from './error-classes.js';
import { createStringsExtension } from './ext/strings/index.js';
import type { RandomSource } from './ext/strings/random.js';
import { FunctionTable } from './runtime/core/table.js';
import type { ObservabilityCallbacks } from './runtime/core/types.js';
import type { ExtensionResult } from './runtime/ext/extensions.js';

/** Options for createFunctionTable() */
export interface CreateFunctionTableOptions {
  /** Namespace, exclusions and aliases (default: everything, unprefixed) */
  config?: StrandConfig | undefined;
  /** Randomness for the rand* functions */
  random?: RandomSource | undefined;
  /** Observability callbacks for monitoring calls */
  observability?: ObservabilityCallbacks | undefined;
}

/**
 * Build a function table with the string library registered.
 *
 * Aliases register the same function under an extra name, inside the
 * namespace when one is configured. Aliases of excluded functions are
 * dropped.
 *
 * @throws {RegistrationError} when an alias collides with a registered name
 */
export function createFunctionTable(
  options: CreateFunctionTableOptions = {}
): FunctionTable {
  const config = options.config;
  const extension = createStringsExtension({ random: options.random });
  const excluded = new Set<string>(config?.exclude ?? []);

  const selected: ExtensionResult = {};
  for (const [name, fn] of Object.entries(extension)) {
    if (!excluded.has(name)) selected[name] = fn;
  }
  for (const [alias, target] of Object.entries(config?.aliases ?? {})) {
    if (selected[alias] !== undefined) {
      throw createError('STRAND-R002', { functionName: alias });
    }
    const fn = selected[target];
    if (fn !== undefined) selected[alias] = fn;
  }

  return new FunctionTable({ observability: options.observability }).registerAll(
    selected,
    { namespace: config?.namespace, subsystem: 'extension:strings' }
  );
}
