/**
 * Launcher Configuration
 *
 * Two layers:
 * - WrapperConfig defaults, merged with what a caller supplies
 * - Launcher settings read from the launcher's own environment:
 *     ENVOY_ALLOWLIST   extra variable names for closed mode (',' or ';' separated)
 *     ENVOY_BNDL_ROOTS  directories scanned for bundles (path-list separated)
 *     ENVOY_LOG_LEVEL   console log level (debug, info, warn, error, silent)
 */

import { WrapperConfig, WrapperConfigInput } from '../models/wrapper-config';
import { ISOLATION_MODES, isIsolationMode } from '../models/environment';
import { ConsoleLogLevel, isConsoleLogLevel } from '../logging';
import { pathListSeparator, splitPathList } from '../environment/normalizer';

export const ENV_ALLOWLIST = 'ENVOY_ALLOWLIST';
export const ENV_BUNDLE_ROOTS = 'ENVOY_BNDL_ROOTS';
export const ENV_LOG_LEVEL = 'ENVOY_LOG_LEVEL';

/**
 * Grace period between the terminate request and the force kill
 */
export const DEFAULT_KILL_GRACE_PERIOD_MS = 5000;

/**
 * Defaults for every WrapperConfig setting except the executable
 */
export const DEFAULT_WRAPPER_OPTIONS: Omit<WrapperConfig, 'executable'> = {
  args: [],
  envFiles: [],
  env: {},
  isolation: 'closed',
  allowlist: [],
  captureOutput: false,
  streamOutput: true,
  shell: false,
  killGracePeriodMs: DEFAULT_KILL_GRACE_PERIOD_MS,
  interruptSignals: ['SIGINT'],
  hooks: {},
  raiseOnError: true,
  continueOnPreRunError: false,
  continueOnPostRunError: true,
};

/**
 * Merge caller settings over the defaults and freeze the result
 */
export function resolveWrapperConfig(input: WrapperConfigInput): Readonly<WrapperConfig> {
  if (!input.executable || input.executable.trim().length === 0) {
    throw new TypeError('WrapperConfig.executable must be a non-empty string');
  }
  if (input.isolation !== undefined && !isIsolationMode(input.isolation)) {
    throw new TypeError(
      `WrapperConfig.isolation must be one of ${ISOLATION_MODES.join(', ')}, got ${String(input.isolation)}`
    );
  }
  if (input.timeoutMs !== undefined && (!Number.isFinite(input.timeoutMs) || input.timeoutMs <= 0)) {
    throw new RangeError(`WrapperConfig.timeoutMs must be a positive number, got ${input.timeoutMs}`);
  }
  if (
    input.killGracePeriodMs !== undefined &&
    (!Number.isFinite(input.killGracePeriodMs) || input.killGracePeriodMs < 0)
  ) {
    throw new RangeError(`WrapperConfig.killGracePeriodMs must be >= 0, got ${input.killGracePeriodMs}`);
  }

  const defaults = DEFAULT_WRAPPER_OPTIONS;
  const config: WrapperConfig = {
    executable: input.executable,
    args: [...(input.args ?? defaults.args)],
    envFiles: [...(input.envFiles ?? defaults.envFiles)],
    env: { ...(input.env ?? defaults.env) },
    isolation: input.isolation ?? defaults.isolation,
    allowlist: [...(input.allowlist ?? defaults.allowlist)],
    sourceEnv: input.sourceEnv,
    cwd: input.cwd,
    captureOutput: input.captureOutput ?? defaults.captureOutput,
    streamOutput: input.streamOutput ?? defaults.streamOutput,
    timeoutMs: input.timeoutMs,
    shell: input.shell ?? defaults.shell,
    killGracePeriodMs: input.killGracePeriodMs ?? defaults.killGracePeriodMs,
    interruptSignals: [...(input.interruptSignals ?? defaults.interruptSignals)],
    hooks: { ...(input.hooks ?? defaults.hooks) },
    raiseOnError: input.raiseOnError ?? defaults.raiseOnError,
    continueOnPreRunError: input.continueOnPreRunError ?? defaults.continueOnPreRunError,
    continueOnPostRunError: input.continueOnPostRunError ?? defaults.continueOnPostRunError,
    logger: input.logger,
  };

  Object.freeze(config.args);
  Object.freeze(config.envFiles);
  Object.freeze(config.env);
  Object.freeze(config.allowlist);
  Object.freeze(config.interruptSignals);
  Object.freeze(config.hooks);
  return Object.freeze(config);
}

/**
 * Settings the launcher reads from its own environment
 */
export interface LauncherSettings {
  allowlist: string[];
  bundleRoots: string[];
  logLevel?: ConsoleLogLevel;
}

/**
 * Parse an allowlist string; entries may be separated by ',' or ';'
 */
export function parseAllowlist(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  const names = value
    .replace(/,/g, ';')
    .split(';')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  return [...new Set(names)];
}

export function loadLauncherSettings(
  sourceEnv: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): LauncherSettings {
  const rawLevel = sourceEnv[ENV_LOG_LEVEL]?.trim().toLowerCase();

  return {
    allowlist: parseAllowlist(sourceEnv[ENV_ALLOWLIST]),
    bundleRoots: splitPathList(sourceEnv[ENV_BUNDLE_ROOTS] ?? '', pathListSeparator(platform)),
    logLevel: rawLevel && isConsoleLogLevel(rawLevel) ? rawLevel : undefined,
  };
}
