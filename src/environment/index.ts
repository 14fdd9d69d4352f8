export {
  EnvironmentComposer,
  composeEnvironment,
  seedEnvironment,
  CORE_ENV_VARS,
  type EnvironmentComposerOptions,
  type ComposeRequest,
} from './environment-composer';
export {
  classifyKey,
  applyOperator,
  parseEnvironmentFile,
  mergeEnvironmentFile,
  type EnvironmentFileEntry,
  type ClassifiedKey,
  type MergeFileOptions,
} from './file-merger';
export { expandTemplate, findTemplateReferences, TEMPLATE_PATTERN } from './expander';
export { normalizeValue, pathListSeparator, splitPathList } from './normalizer';
export { VariableMap } from './variable-map';
export { getSpecialVariables } from './special-variables';
