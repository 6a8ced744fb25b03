/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'bind' | 'registration' | 'config';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: STRAND-{category}{3-digit} (e.g., STRAND-B001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Binding Errors (STRAND-B0xx)
  {
    errorId: 'STRAND-B001',
    category: 'bind',
    description: 'Wrong number of arguments',
    messageTemplate:
      'Function {functionName} expects {expected} arguments, got {actual}',
    cause: 'The call site passed more or fewer arguments than the function declares.',
    resolution:
      'Pass exactly the declared arguments. Use describe() on the function table to list signatures.',
  },
  {
    errorId: 'STRAND-B002',
    category: 'bind',
    description: 'Argument is not a template value',
    messageTemplate:
      'Function {functionName}: argument {ordinal} ({paramName}) does not hold a template value',
    cause:
      'The opaque handle at this position carries a payload that is not part of the value union.',
    resolution:
      'Wrap arguments with OpaqueValue.wrap() or argumentList() before calling.',
  },
  {
    errorId: 'STRAND-B003',
    category: 'bind',
    description: 'Argument type mismatch',
    messageTemplate:
      'Function {functionName}: argument {ordinal} ({paramName}) expects {expected}, got {actual}',
    cause:
      'The value cannot be converted to the parameter type. Strings are never parsed as numbers and numbers are never formatted as strings.',
    resolution:
      'Convert the value before the call, or pass a value of the declared type.',
  },
  {
    errorId: 'STRAND-B004',
    category: 'bind',
    description: 'Function rejected its input',
    messageTemplate: '{message}',
    cause:
      'Arguments were well-typed but the function body refused them (e.g. malformed base-64).',
    resolution: 'Check the argument contents against the function contract.',
  },
  {
    errorId: 'STRAND-B005',
    category: 'bind',
    description: 'Unknown function',
    messageTemplate: 'Function {functionName} is not registered',
    cause: 'No function with this name exists in the function table.',
    resolution:
      'Check the spelling and the namespace prefix, and whether configuration excludes it.',
  },
  {
    errorId: 'STRAND-B006',
    category: 'bind',
    description: 'Return value outside its type',
    messageTemplate:
      'Function {functionName} returned {actual}, which is not a valid {expected}',
    cause:
      'The function body produced a value its declared return type cannot represent (e.g. 1.5 for int).',
    resolution: 'Fix the function body or declare a wider return type.',
  },

  // Registration Errors (STRAND-R0xx)
  {
    errorId: 'STRAND-R001',
    category: 'registration',
    description: 'Invalid function name',
    messageTemplate: 'Invalid function name: {functionName}',
    cause:
      'Names must be identifiers, optionally namespaced with :: (e.g. str::trim).',
    resolution: 'Rename the function or the namespace.',
  },
  {
    errorId: 'STRAND-R002',
    category: 'registration',
    description: 'Duplicate function name',
    messageTemplate: 'Function {functionName} is already registered',
    cause: 'Two registrations used the same name.',
    resolution: 'Unregister the first function or register under a namespace.',
  },
  {
    errorId: 'STRAND-R003',
    category: 'registration',
    description: 'Invalid namespace',
    messageTemplate:
      'Invalid namespace {namespace}: use letters, digits, "_" or "-"',
    cause: 'Namespaces prefix function names as namespace::name.',
    resolution: 'Rename the namespace.',
  },

  // Configuration Errors (STRAND-C0xx)
  {
    errorId: 'STRAND-C001',
    category: 'config',
    description: 'Config file unreadable',
    messageTemplate: 'Cannot read config file {source}: {reason}',
    cause: 'The file does not exist or is not readable.',
    resolution: 'Check the path passed to loadConfig().',
  },
  {
    errorId: 'STRAND-C002',
    category: 'config',
    description: 'Malformed YAML',
    messageTemplate: 'Invalid YAML in {source}: {reason}',
    cause: 'The configuration is not well-formed YAML or is not a mapping.',
    resolution: 'Fix the YAML syntax; the document root must be a mapping.',
  },
  {
    errorId: 'STRAND-C003',
    category: 'config',
    description: 'Invalid config field',
    messageTemplate: 'Invalid "{field}" in {source}: {reason}',
    cause: 'A configuration key is unknown or holds a value of the wrong type.',
    resolution: 'See the configuration section of the README for accepted keys.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "string", actual: "int"})
 * // Returns: "Expected string, got int"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      // Unclosed brace
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
