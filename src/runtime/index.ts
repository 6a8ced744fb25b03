/**
 * Strand Runtime
 *
 * The binding adapter and function table.
 *
 * Module Structure:
 * - core/: Adapter machinery
 *   - values.ts: TemplateValue union and value utilities
 *   - equals.ts: Structural equality
 *   - opaque.ts: OpaqueValue handles and argument lists
 *   - result.ts: Result type
 *   - signature.ts: Value types and typed signatures
 *   - callable.ts: defineFunction (the adapter)
 *   - table.ts: Function table
 *   - introspection.ts: Function metadata
 *   - types.ts: Observability callbacks and events
 * - ext/: Extension plumbing (prefixing, events)
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ErrorEvent,
  ExtensionEvent,
  FunctionReturnEvent,
  HostCallEvent,
  ObservabilityCallbacks,
} from './core/types.js';
export type { ExtensionFactory, ExtensionResult } from './ext/extensions.js';

// ============================================================
// VALUES
// ============================================================

export {
  array,
  bool,
  float,
  formatValue,
  fromNative,
  int,
  isTemplateValue,
  kindOf,
  map,
  nil,
  str,
  type TemplateArray,
  type TemplateBool,
  type TemplateFloat,
  type TemplateInt,
  type TemplateKind,
  type TemplateMap,
  type TemplateNil,
  type TemplateString,
  type TemplateValue,
} from './core/values.js';
export { deepEquals } from './core/equals.js';
export { argumentList, OpaqueValue, type ArgumentList } from './core/opaque.js';
export { err, ok, type Result } from './core/result.js';

// ============================================================
// BINDING
// ============================================================

export {
  params,
  Signature,
  types,
  type ParamMetadata,
  type ValueType,
} from './core/signature.js';
export {
  defineFunction,
  type CallResult,
  type FunctionDefinition,
  type HostFunction,
  type HostResult,
} from './core/callable.js';
export { FunctionTable, type FunctionTableOptions } from './core/table.js';
export {
  describeFunction,
  formatSignature,
  type FunctionMetadata,
} from './core/introspection.js';
export { emitExtensionEvent, prefixFunctions } from './ext/extensions.js';
