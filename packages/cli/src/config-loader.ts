/**
 * Configuration Loader for chainmark
 * Loads and validates .chainmark.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import * as yaml from 'yaml';
import {
  resolveConfig,
  type EmitConventions,
  type MarkupConfig,
  type MarkupConfigInput,
} from 'chainmark';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file looked up in the working directory */
export const CONFIG_FILE_NAME = '.chainmark.yaml';

const CONVENTION_FIELDS = [
  'nativeConstructor',
  'componentConstructor',
  'attachOne',
  'attachMany',
  'erase',
  'defer',
] as const satisfies readonly (keyof EmitConventions)[];

const TOP_LEVEL_FIELDS = new Set([
  'nativeTags',
  'deferredTag',
  'componentPattern',
  'conventions',
  'macro',
]);

// ============================================================
// TYPES
// ============================================================

export interface LoadedConfig {
  readonly markup: MarkupConfig;
  /** Macro name from the file, when set */
  readonly macroName: string | undefined;
  /** Path the configuration came from, or null for defaults */
  readonly path: string | null;
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(reason: string): Error {
  return new Error(`Invalid configuration: ${reason}`);
}

function optionalString(
  data: Record<string, unknown>,
  key: string,
  label: string
): string | undefined {
  const value = data[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw invalid(`${label} must be a string`);
  }
  return value;
}

function readNativeTags(value: unknown): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw invalid('nativeTags must be a list of names');
  }
  const tags: string[] = [];
  for (const tag of value) {
    if (typeof tag !== 'string') {
      throw invalid('nativeTags must be a list of names');
    }
    tags.push(tag);
  }
  return tags;
}

function readConventions(value: unknown): Partial<EmitConventions> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw invalid('conventions must be a mapping');
  }

  const known = new Set<string>(CONVENTION_FIELDS);
  for (const key of Object.keys(value)) {
    if (!known.has(key)) {
      throw invalid(`unknown field conventions.${key}`);
    }
  }

  const conventions: { -readonly [K in keyof EmitConventions]?: string } = {};
  for (const field of CONVENTION_FIELDS) {
    const template = optionalString(value, field, `conventions.${field}`);
    if (template !== undefined) {
      conventions[field] = template;
    }
  }
  return conventions;
}

/**
 * Check the shape of parsed YAML and turn it into transformer input.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function parseConfigData(data: unknown): {
  input: MarkupConfigInput;
  macroName: string | undefined;
} {
  // An empty file parses to null
  if (data === null || data === undefined) {
    return { input: {}, macroName: undefined };
  }
  if (!isRecord(data)) {
    throw invalid('must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!TOP_LEVEL_FIELDS.has(key)) {
      throw invalid(`unknown field ${key}`);
    }
  }

  return {
    input: {
      nativeTags: readNativeTags(data['nativeTags']),
      deferredTag: optionalString(data, 'deferredTag', 'deferredTag'),
      componentPattern: optionalString(data, 'componentPattern', 'componentPattern'),
      conventions: readConventions(data['conventions']),
    },
    macroName: optionalString(data, 'macro', 'macro'),
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load a YAML configuration file.
 *
 * @throws Error with "File not found: {path}" when the file is missing
 * @throws Error with "Invalid configuration: {reason}" when it is unusable
 */
export function loadConfigFile(path: string): LoadedConfig {
  if (!existsSync(path)) {
    throw new Error(`File not found: ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw invalid(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  const { input, macroName } = parseConfigData(parsed);
  return { markup: resolveConfig(input), macroName, path };
}

/**
 * Resolve the configuration for a run: an explicit `--config` file, else
 * .chainmark.yaml in `cwd` when present, else the defaults.
 */
export function loadConfig(cwd: string, explicitPath?: string): LoadedConfig {
  if (explicitPath !== undefined) {
    return loadConfigFile(resolve(cwd, explicitPath));
  }

  const candidate = join(cwd, CONFIG_FILE_NAME);
  if (existsSync(candidate)) {
    return loadConfigFile(candidate);
  }

  return { markup: resolveConfig(), macroName: undefined, path: null };
}
