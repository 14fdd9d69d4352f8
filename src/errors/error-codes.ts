/**
 * Error Codes for the envoy launcher
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  EXECUTION = 'EXECUTION',
  LIFECYCLE_HOOK = 'LIFECYCLE_HOOK',
}

/**
 * Error Codes
 * E1xx: Configuration Errors - abort the run before anything is spawned
 * E2xx: Execution Errors - resolution, spawn and child exit failures
 * E3xx: Lifecycle Hook Errors - pre-run / post-run failures
 */
export enum ErrorCode {
  // E1xx: Configuration Errors
  E101_CONFIGURATION_FILE_MISSING = 'E101',
  E102_CONFIGURATION_PARSE_ERROR = 'E102',
  E103_BUNDLE_CONFIG_INVALID = 'E103',
  E104_COMMAND_NOT_FOUND = 'E104',

  // E2xx: Execution Errors
  E201_EXECUTABLE_NOT_FOUND = 'E201',
  E202_SPAWN_FAILURE = 'E202',
  E203_EXECUTION_FAILURE = 'E203',
  E204_STATE_TRANSITION_INVALID = 'E204',

  // E3xx: Lifecycle Hook Errors
  E301_PRE_RUN_FAILURE = 'E301',
  E302_POST_RUN_FAILURE = 'E302',
}

/**
 * Error messages for each error code
 */
const ERROR_MESSAGES: Record<ErrorCode, string> = {
  // E1xx
  E101: 'Environment file not found',
  E102: 'Malformed environment file',
  E103: 'Invalid bundle configuration',
  E104: 'Command not found',

  // E2xx
  E201: 'Executable not found',
  E202: 'Failed to spawn process',
  E203: 'Execution failed',
  E204: 'Invalid state transition',

  // E3xx
  E301: 'Pre-run operation failed',
  E302: 'Post-run operation failed',
};

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const codeStr = code.toString();
  if (codeStr.startsWith('E1')) {
    return ErrorCategory.CONFIGURATION;
  }
  if (codeStr.startsWith('E2')) {
    return ErrorCategory.EXECUTION;
  }
  if (codeStr.startsWith('E3')) {
    return ErrorCategory.LIFECYCLE_HOOK;
  }
  throw new Error(`Unknown error code: ${code}`);
}

/**
 * Get the error message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code] || `Unknown error: ${code}`;
}

/**
 * Check if the error code is a configuration error (E1xx)
 */
export function isConfigurationError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.CONFIGURATION;
}

/**
 * Check if the error code is an execution error (E2xx)
 */
export function isExecutionError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.EXECUTION;
}

/**
 * Check if the error code is a lifecycle hook error (E3xx)
 */
export function isLifecycleHookError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.LIFECYCLE_HOOK;
}
