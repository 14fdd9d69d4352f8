/**
 * Environment model types
 */

/**
 * Final name → value mapping handed to the child process
 */
export type EnvironmentMapping = Record<string, string>;

/**
 * Isolation policy for the seed of a composed environment
 * - closed: core variables plus the allowlist, each only if set in the launcher
 * - passthrough: the launcher's entire environment
 */
export type IsolationMode = 'closed' | 'passthrough';

export const ISOLATION_MODES: readonly IsolationMode[] = ['closed', 'passthrough'];

export function isIsolationMode(value: unknown): value is IsolationMode {
  return ISOLATION_MODES.some((mode) => mode === value);
}

/**
 * Scalar allowed as an environment file value
 */
export type ConfigScalar = string | number | boolean;

/**
 * Environment file value: a scalar or an ordered list of scalars
 */
export type ConfigValue = ConfigScalar | ConfigScalar[];

/**
 * Operator encoded in an environment file key prefix
 */
export type KeyOperator = 'replace' | 'append' | 'prepend';

/**
 * Key prefixes for the append and prepend operators
 */
export const APPEND_PREFIX = '+=';
export const PREPEND_PREFIX = '^=';

/**
 * Template values derived from an environment file's location.
 * Recomputed for every file; they win over every other lookup.
 */
export interface SpecialVariables {
  __FILE__: string;
  __BUNDLE__: string;
  __BUNDLE_ENV__: string;
  __BUNDLE_NAME__: string;
}

/**
 * Name of the directory that marks a bundle's environment files
 */
export const BUNDLE_ENV_DIR_NAME = 'envoy_env';
