export {
  COMMANDS_FILE_NAME,
  GLOBAL_ENV_FILE_NAME,
  DEFAULT_MAX_SEARCH_DEPTH,
  isGitRepo,
  validateBundle,
  indexEnvFiles,
  createBundleInfo,
  findGitRepos,
  discoverBundlesFromRoots,
  loadBundlesFromConfig,
  getBundles,
  getBundleEnvFiles,
  getBundleCommandsFiles,
  type BundleInfo,
  type DiscoveryOptions,
  type GetBundlesOptions,
} from './bundle-discovery';
