/**
 * Wrapper Error - Base error class for the envoy launcher
 *
 * Every failure the launcher raises is a WrapperError subtype, so callers
 * can catch broadly (WrapperError) or narrowly (e.g. PreRunError).
 */

import { ErrorCategory, ErrorCode, getErrorCategory, getErrorMessage } from './error-codes';

export interface WrapperErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base error class for the envoy launcher
 */
export class WrapperError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly context?: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, context?: string, options: WrapperErrorOptions = {}) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'WrapperError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.context = context;
    this.details = options.details;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * An environment file named in the file list does not exist
 */
export class ConfigurationFileMissingError extends WrapperError {
  public readonly filePath: string;

  constructor(filePath: string) {
    super(ErrorCode.E101_CONFIGURATION_FILE_MISSING, filePath, { details: { filePath } });
    this.name = 'ConfigurationFileMissingError';
    this.filePath = filePath;
  }
}

/**
 * An environment file could not be parsed, or is not a flat key/value mapping
 */
export class ConfigurationParseError extends WrapperError {
  public readonly filePath: string;

  constructor(filePath: string, reason: string, cause?: unknown) {
    super(ErrorCode.E102_CONFIGURATION_PARSE_ERROR, `${filePath}: ${reason}`, {
      details: { filePath, reason },
      cause,
    });
    this.name = 'ConfigurationParseError';
    this.filePath = filePath;
  }
}

/**
 * A bundle list file or a commands manifest is unreadable or has the wrong shape
 */
export class BundleConfigError extends WrapperError {
  constructor(context: string, cause?: unknown) {
    super(ErrorCode.E103_BUNDLE_CONFIG_INVALID, context, { cause });
    this.name = 'BundleConfigError';
  }
}

/**
 * A named command is not defined in any loaded manifest
 */
export class CommandNotFoundError extends WrapperError {
  public readonly commandName: string;

  constructor(commandName: string) {
    super(ErrorCode.E104_COMMAND_NOT_FOUND, commandName, { details: { commandName } });
    this.name = 'CommandNotFoundError';
    this.commandName = commandName;
  }
}

/**
 * The requested executable could not be resolved
 */
export class ExecutableNotFoundError extends WrapperError {
  public readonly executable: string;

  constructor(executable: string, reason: string) {
    super(ErrorCode.E201_EXECUTABLE_NOT_FOUND, `'${executable}' ${reason}`, {
      details: { executable },
    });
    this.name = 'ExecutableNotFoundError';
    this.executable = executable;
  }
}

/**
 * The OS refused to start the child process
 */
export class SpawnError extends WrapperError {
  constructor(context: string, cause?: unknown) {
    super(ErrorCode.E202_SPAWN_FAILURE, context, { cause });
    this.name = 'SpawnError';
  }
}

/**
 * The wrapper was asked to move between two run states that are not adjacent
 */
export class StateTransitionError extends WrapperError {
  constructor(from: string, to: string) {
    super(ErrorCode.E204_STATE_TRANSITION_INVALID, `${from} -> ${to}`, { details: { from, to } });
    this.name = 'StateTransitionError';
  }
}

/**
 * Details attached to an ExecutionError
 */
export interface ExecutionErrorDetails {
  returnCode: number;
  timedOut: boolean;
  command: string[];
  timeoutMs?: number;
}

/**
 * The child exited unsuccessfully (non-zero exit or timeout) under strict mode
 */
export class ExecutionError extends WrapperError {
  public readonly returnCode: number;
  public readonly timedOut: boolean;
  public readonly command: string[];
  public readonly timeoutMs?: number;

  constructor(context: string, details: ExecutionErrorDetails, cause?: unknown) {
    super(ErrorCode.E203_EXECUTION_FAILURE, context, {
      details: { ...details },
      cause,
    });
    this.name = 'ExecutionError';
    this.returnCode = details.returnCode;
    this.timedOut = details.timedOut;
    this.command = [...details.command];
    this.timeoutMs = details.timeoutMs;
  }
}

/**
 * The pre-run hook threw and continueOnPreRunError is off
 */
export class PreRunError extends WrapperError {
  constructor(cause: unknown) {
    super(ErrorCode.E301_PRE_RUN_FAILURE, describeError(cause), { cause });
    this.name = 'PreRunError';
  }
}

/**
 * The post-run hook threw and continueOnPostRunError is off
 */
export class PostRunError extends WrapperError {
  constructor(cause: unknown) {
    super(ErrorCode.E302_POST_RUN_FAILURE, describeError(cause), { cause });
    this.name = 'PostRunError';
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
