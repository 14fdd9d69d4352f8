/**
 * envoy launcher
 *
 * Runs applications inside environments composed from layered,
 * templated configuration files.
 */

export * from './errors';
export * from './models';
export * from './logging';
export * from './environment';
export * from './executor';
export * from './wrapper';
export * from './bundles';
export * from './commands';
export {
  ENV_ALLOWLIST,
  ENV_BUNDLE_ROOTS,
  ENV_LOG_LEVEL,
  DEFAULT_KILL_GRACE_PERIOD_MS,
  DEFAULT_WRAPPER_OPTIONS,
  resolveWrapperConfig,
  parseAllowlist,
  loadLauncherSettings,
  type LauncherSettings,
} from './config/launcher-config';
export {
  CLI,
  CLIError,
  parseArgs,
  readPackageVersion,
  HELP_TEXT,
  EXIT_SUCCESS,
  EXIT_FAILURE,
  EXIT_INTERRUPTED,
  type ParsedArgs,
  type CLIOutput,
  type CLIContext,
} from './cli/cli-interface';
