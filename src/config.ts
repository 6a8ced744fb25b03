/**
 * Configuration Loader
 *
 * Reads strand.config.yaml: namespace, excluded functions and aliases
 * for the function table built by createFunctionTable().
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { createError } from './error-classes.js';
import { STRING_FUNCTION_NAMES, type StringFunctionName } from './ext/strings/index.js';
import { NAMESPACE_PATTERN } from './runtime/ext/extensions.js';

export const DEFAULT_CONFIG_FILENAME = 'strand.config.yaml';

/** Validated configuration */
export interface StrandConfig {
  /** Register functions as namespace::name */
  readonly namespace?: string | undefined;
  /** Functions left out of the table */
  readonly exclude: readonly StringFunctionName[];
  /** Extra name -> registered function name */
  readonly aliases: Readonly<Record<string, StringFunctionName>>;
}

const KNOWN_KEYS = new Set(['namespace', 'exclude', 'aliases']);
const KNOWN_FUNCTIONS: ReadonlySet<string> = new Set(STRING_FUNCTION_NAMES);

function isFunctionName(name: string): name is StringFunctionName {
  return KNOWN_FUNCTIONS.has(name);
}

function invalid(field: string, source: string, reason: string): Error {
  return createError('STRAND-C003', { field, source, reason });
}

/**
 * Parse and validate YAML configuration text.
 * An empty document yields the default configuration.
 *
 * @param source - File name or label used in error messages
 * @throws {ConfigError} STRAND-C002 malformed YAML, STRAND-C003 invalid field
 */
export function parseConfig(text: string, source = DEFAULT_CONFIG_FILENAME): StrandConfig {
  let document: unknown;
  try {
    document = yaml.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw createError('STRAND-C002', { source, reason });
  }

  // yaml.parse returns null for empty content
  if (document === null || document === undefined) {
    return { exclude: [], aliases: {} };
  }
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw createError('STRAND-C002', { source, reason: 'document root must be a mapping' });
  }

  const raw = new Map<string, unknown>(Object.entries(document));
  for (const key of raw.keys()) {
    if (!KNOWN_KEYS.has(key)) {
      throw invalid(key, source, 'unknown key');
    }
  }

  return {
    namespace: parseNamespace(raw.get('namespace'), source),
    exclude: parseExclude(raw.get('exclude'), source),
    aliases: parseAliases(raw.get('aliases'), source),
  };
}

function parseNamespace(value: unknown, source: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || !NAMESPACE_PATTERN.test(value)) {
    throw invalid('namespace', source, 'must be letters, digits, "_" or "-"');
  }
  return value;
}

function parseExclude(value: unknown, source: string): StringFunctionName[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw invalid('exclude', source, 'must be a list of function names');
  }
  return value.map((entry: unknown) => {
    if (typeof entry !== 'string' || !isFunctionName(entry)) {
      throw invalid('exclude', source, `unknown function ${String(entry)}`);
    }
    return entry;
  });
}

function parseAliases(
  value: unknown,
  source: string
): Record<string, StringFunctionName> {
  if (value === undefined || value === null) return {};
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw invalid('aliases', source, 'must be a mapping of alias to function name');
  }

  const aliases: Record<string, StringFunctionName> = {};
  for (const [alias, target] of Object.entries(value)) {
    if (typeof target !== 'string' || !isFunctionName(target)) {
      throw invalid('aliases', source, `alias ${alias} targets unknown function ${String(target)}`);
    }
    aliases[alias] = target;
  }
  return aliases;
}

/**
 * Load configuration from a YAML file.
 *
 * @throws {ConfigError} STRAND-C001 when the file cannot be read
 */
export async function loadConfig(filePath: string): Promise<StrandConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw createError('STRAND-C001', { source: filePath, reason });
  }
  return parseConfig(text, filePath);
}
