export {
  ErrorCategory,
  ErrorCode,
  getErrorCategory,
  getErrorMessage,
  isConfigurationError,
  isExecutionError,
  isLifecycleHookError,
} from './error-codes';

export {
  WrapperError,
  ConfigurationFileMissingError,
  ConfigurationParseError,
  BundleConfigError,
  CommandNotFoundError,
  ExecutableNotFoundError,
  SpawnError,
  StateTransitionError,
  ExecutionError,
  PreRunError,
  PostRunError,
  describeError,
  type WrapperErrorOptions,
  type ExecutionErrorDetails,
} from './wrapper-error';
