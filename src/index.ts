/**
 * Strand Module
 * Exports the binding adapter, function table and string library
 */

export * from './runtime/index.js';
export {
  BindError,
  ConfigError,
  createError,
  RegistrationError,
  StrandError,
  type BindErrorKind,
  type StrandErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export {
  createStringsExtension,
  STRING_FUNCTION_NAMES,
  type StringFunctionName,
  type StringsConfig,
} from './ext/strings/index.js';
export {
  ALPHABETS,
  cryptoRandomSource,
  randomString,
  type RandomSource,
} from './ext/strings/random.js';
export {
  DEFAULT_CONFIG_FILENAME,
  loadConfig,
  parseConfig,
  type StrandConfig,
} from './config.js';
export { createFunctionTable, type CreateFunctionTableOptions } from './functions.js';
