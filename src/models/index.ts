export {
  ISOLATION_MODES,
  isIsolationMode,
  APPEND_PREFIX,
  PREPEND_PREFIX,
  BUNDLE_ENV_DIR_NAME,
  type EnvironmentMapping,
  type IsolationMode,
  type ConfigScalar,
  type ConfigValue,
  type KeyOperator,
  type SpecialVariables,
} from './environment';
export { ExecutionResult, TIMEOUT_RETURN_CODE, INTERRUPTED_RETURN_CODE } from './execution-result';
export type { WrapperConfig, WrapperConfigInput, WrapperHooks } from './wrapper-config';
export { WrapperState, isValidStateTransition, isActiveState } from './wrapper-state';
