/**
 * File Merger
 *
 * Parses one environment file and folds its keys, in document order, into
 * the mapping under construction.
 *
 * Examples (JSON):
 *   List:     "PLUGIN_PATH": ["/opt/a", "/opt/b"]
 *   Append:   "+=PLUGIN_PATH": ["/opt/c"]
 *   Prepend:  "^=PLUGIN_PATH": "/opt/first"
 *   Replace:  "PLUGIN_PATH": "/opt/only"
 *   Variable: "PLUGIN_PATH": "{$PLUGIN_PATH}:/opt/more"
 *   Special:  "PATH": "{$__BUNDLE__}/bin"
 *
 * .yaml / .yml files hold the same flat mapping in YAML.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import {
  APPEND_PREFIX,
  ConfigScalar,
  ConfigValue,
  KeyOperator,
  PREPEND_PREFIX,
} from '../models/environment';
import { ConfigurationFileMissingError, ConfigurationParseError, describeError } from '../errors';
import { expandTemplate } from './expander';
import { normalizeValue } from './normalizer';
import { getSpecialVariables } from './special-variables';

/**
 * One key of an environment file, in document order
 */
export interface EnvironmentFileEntry {
  key: string;
  value: ConfigValue;
}

export interface ClassifiedKey {
  operator: KeyOperator;
  name: string;
}

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

/**
 * Split an operator prefix from a key
 */
export function classifyKey(key: string): ClassifiedKey {
  if (key.startsWith(APPEND_PREFIX)) {
    return { operator: 'append', name: key.slice(APPEND_PREFIX.length) };
  }
  if (key.startsWith(PREPEND_PREFIX)) {
    return { operator: 'prepend', name: key.slice(PREPEND_PREFIX.length) };
  }
  return { operator: 'replace', name: key };
}

/**
 * Apply one operator to the mapping under construction.
 * The current value is read from `env` only.
 */
export function applyOperator(
  env: Map<string, string>,
  name: string,
  operator: KeyOperator,
  value: string,
  separator: string
): void {
  if (operator === 'replace') {
    env.set(name, value);
    return;
  }

  const current = env.get(name) ?? '';
  if (!current) {
    env.set(name, value);
  } else if (operator === 'append') {
    env.set(name, `${current}${separator}${value}`);
  } else {
    env.set(name, `${value}${separator}${current}`);
  }
}

/**
 * Read and validate an environment file
 */
export function parseEnvironmentFile(filePath: string): EnvironmentFileEntry[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationFileMissingError(filePath);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationParseError(filePath, `unreadable (${describeError(error)})`, error);
  }

  const document = parseDocument(filePath, content);

  if (!isPlainObject(document)) {
    throw new ConfigurationParseError(filePath, 'document must contain a single key/value object');
  }

  return Object.entries(document).map(([key, value]) => {
    if (classifyKey(key).name.length === 0) {
      throw new ConfigurationParseError(filePath, `key '${key}' has no variable name`);
    }
    if (!isConfigValue(value)) {
      throw new ConfigurationParseError(
        filePath,
        `value of '${key}' must be a string, number, boolean or a list of those`
      );
    }
    return { key, value };
  });
}

export interface MergeFileOptions {
  separator: string;
}

/**
 * Merge one file into `env`; returns the number of keys applied
 */
export function mergeEnvironmentFile(
  filePath: string,
  env: Map<string, string>,
  options: MergeFileOptions
): number {
  const entries = parseEnvironmentFile(filePath);
  const specialVars = getSpecialVariables(filePath);

  for (const { key, value } of entries) {
    const { operator, name } = classifyKey(key);
    const normalized = normalizeValue(value, options.separator);
    const expanded = expandTemplate(normalized, env, specialVars);
    applyOperator(env, name, operator, expanded, options.separator);
  }

  return entries.length;
}

function parseDocument(filePath: string, content: string): unknown {
  const extension = path.extname(filePath).toLowerCase();

  if (YAML_EXTENSIONS.has(extension)) {
    try {
      return yaml.load(content, { filename: filePath, schema: yaml.CORE_SCHEMA });
    } catch (error) {
      throw new ConfigurationParseError(filePath, `invalid YAML (${describeError(error)})`, error);
    }
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationParseError(filePath, `invalid JSON (${describeError(error)})`, error);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isConfigScalar(value: unknown): value is ConfigScalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isConfigValue(value: unknown): value is ConfigValue {
  if (Array.isArray(value)) {
    return value.every(isConfigScalar);
  }
  return isConfigScalar(value);
}
