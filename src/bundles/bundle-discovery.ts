/**
 * Bundle Discovery
 *
 * A bundle is a directory holding an `envoy_env/` directory of environment
 * files (and optionally a commands.json). Bundles come from either:
 * 1. An explicit bundle config file: {"bundles": [paths]} or [paths]
 * 2. Auto-discovery: git repositories found under the ENVOY_BNDL_ROOTS roots
 */

import * as fs from 'fs';
import * as path from 'path';
import { BundleConfigError, ConfigurationFileMissingError, describeError } from '../errors';
import { BUNDLE_ENV_DIR_NAME } from '../models/environment';
import { WrapperLogger, getWrapperLogger } from '../logging';

export const COMMANDS_FILE_NAME = 'commands.json';
export const GLOBAL_ENV_FILE_NAME = 'global_env.json';
export const DEFAULT_MAX_SEARCH_DEPTH = 5;

const ENV_FILE_EXTENSIONS = new Set(['.json', '.yaml', '.yml']);

export interface BundleInfo {
  /** Directory name of the bundle root */
  name: string;
  /** Absolute bundle root */
  root: string;
  /** Absolute path of the bundle's envoy_env directory */
  envDir: string;
  /** Environment files of envoy_env, by file name */
  envFiles: Map<string, string>;
}

export interface DiscoveryOptions {
  logger?: WrapperLogger;
  maxDepth?: number;
}

function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}

function isFile(target: string): boolean {
  try {
    return fs.statSync(target).isFile();
  } catch {
    return false;
  }
}

export function isGitRepo(dir: string): boolean {
  return isDirectory(path.join(dir, '.git'));
}

/**
 * A valid bundle is a directory with an envoy_env subdirectory
 */
export function validateBundle(dir: string): boolean {
  return isDirectory(dir) && isDirectory(path.join(dir, BUNDLE_ENV_DIR_NAME));
}

/**
 * Index the environment files of a bundle's envoy_env directory, sorted by name
 */
export function indexEnvFiles(envDir: string): Map<string, string> {
  const files = new Map<string, string>();
  if (!isDirectory(envDir)) {
    return files;
  }
  const names = fs
    .readdirSync(envDir)
    .filter((name) => ENV_FILE_EXTENSIONS.has(path.extname(name).toLowerCase()))
    .sort();
  for (const name of names) {
    const filePath = path.join(envDir, name);
    if (isFile(filePath)) {
      files.set(name, filePath);
    }
  }
  return files;
}

export function createBundleInfo(root: string): BundleInfo {
  const resolved = path.resolve(root);
  const envDir = path.join(resolved, BUNDLE_ENV_DIR_NAME);
  return {
    name: path.basename(resolved),
    root: resolved,
    envDir,
    envFiles: indexEnvFiles(envDir),
  };
}

/**
 * Find git repositories under a root. Hidden directories are skipped and
 * the search does not descend into a repository it has found.
 */
export function findGitRepos(rootDir: string, options: DiscoveryOptions = {}): string[] {
  const logger = options.logger ?? getWrapperLogger();
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_SEARCH_DEPTH;
  const repos: string[] = [];

  if (!isDirectory(rootDir)) {
    logger.warn('DISCOVERY', `Root directory does not exist: ${rootDir}`, { rootDir });
    return repos;
  }

  const search = (dir: string, depth: number): void => {
    if (depth > maxDepth) {
      return;
    }
    if (isGitRepo(dir)) {
      repos.push(dir);
      return;
    }

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      logger.debug('DISCOVERY', `Cannot read ${dir}: ${describeError(error)}`, { dir });
      return;
    }

    const subdirs = entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort();
    for (const name of subdirs) {
      search(path.join(dir, name), depth + 1);
    }
  };

  search(rootDir, 0);
  return repos;
}

/**
 * Discover bundles among the git repositories under each root, in root order
 */
export function discoverBundlesFromRoots(roots: readonly string[], options: DiscoveryOptions = {}): BundleInfo[] {
  const logger = options.logger ?? getWrapperLogger();
  const bundles: BundleInfo[] = [];

  for (const root of roots) {
    const resolvedRoot = path.resolve(root);
    logger.debug('DISCOVERY', `Searching for bundles in ${resolvedRoot}`, { root: resolvedRoot });

    const repos = findGitRepos(resolvedRoot, options);
    logger.debug('DISCOVERY', `Found ${repos.length} git repositories in ${resolvedRoot}`);

    for (const repo of repos) {
      if (validateBundle(repo)) {
        const bundle = createBundleInfo(repo);
        bundles.push(bundle);
        logger.info('DISCOVERY', `Discovered bundle: ${bundle.name} (${bundle.root})`, { root: bundle.root });
      } else {
        logger.debug('DISCOVERY', `Git repository is not a bundle: ${repo}`);
      }
    }
  }

  return bundles;
}

/**
 * Load bundles listed in a JSON config file. Entries that are not valid
 * bundles are skipped with a warning; relative entries resolve against
 * the config file's directory.
 */
export function loadBundlesFromConfig(configFile: string, options: DiscoveryOptions = {}): BundleInfo[] {
  const logger = options.logger ?? getWrapperLogger();

  if (!isFile(configFile)) {
    throw new ConfigurationFileMissingError(configFile);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
  } catch (error) {
    throw new BundleConfigError(`${configFile}: invalid JSON (${describeError(error)})`, error);
  }

  let entries: unknown;
  if (Array.isArray(data)) {
    entries = data;
  } else if (typeof data === 'object' && data !== null) {
    entries = Object.prototype.hasOwnProperty.call(data, 'bundles') ? Reflect.get(data, 'bundles') : [];
  } else {
    throw new BundleConfigError(`${configFile}: must be a JSON object or array`);
  }

  if (!Array.isArray(entries)) {
    throw new BundleConfigError(`${configFile}: "bundles" must be an array`);
  }

  const baseDir = path.dirname(path.resolve(configFile));
  const bundles: BundleInfo[] = [];

  for (const entry of entries) {
    if (typeof entry !== 'string' || entry.trim().length === 0) {
      logger.warn('DISCOVERY', `Invalid bundle entry in ${configFile}: ${JSON.stringify(entry)}`);
      continue;
    }
    const bundleRoot = path.resolve(baseDir, entry);
    if (!validateBundle(bundleRoot)) {
      logger.warn('DISCOVERY', `Invalid bundle in config: ${bundleRoot}`, { bundleRoot });
      continue;
    }
    const bundle = createBundleInfo(bundleRoot);
    bundles.push(bundle);
    logger.info('DISCOVERY', `Loaded bundle from config: ${bundle.name} (${bundle.root})`);
  }

  return bundles;
}

export interface GetBundlesOptions extends DiscoveryOptions {
  /** Explicit bundle config file; when given, auto-discovery is skipped */
  configFile?: string;
  /** Roots for auto-discovery (ENVOY_BNDL_ROOTS) */
  roots?: readonly string[];
}

/**
 * Bundles from the config file when one is given, otherwise auto-discovered
 */
export function getBundles(options: GetBundlesOptions = {}): BundleInfo[] {
  const logger = options.logger ?? getWrapperLogger();

  if (options.configFile) {
    logger.info('DISCOVERY', `Using bundle config file: ${options.configFile}`);
    return loadBundlesFromConfig(options.configFile, options);
  }

  const roots = options.roots ?? [];
  if (roots.length === 0) {
    logger.debug('DISCOVERY', 'No bundle roots configured, skipping auto-discovery');
    return [];
  }

  logger.info('DISCOVERY', `Auto-discovering bundles from ${roots.length} root(s)`);
  return discoverBundlesFromRoots(roots, options);
}

/**
 * Environment files of each bundle (commands.json excluded), by bundle name
 */
export function getBundleEnvFiles(bundles: readonly BundleInfo[]): Map<string, string[]> {
  const result = new Map<string, string[]>();
  for (const bundle of bundles) {
    const files = [...bundle.envFiles.entries()]
      .filter(([name]) => name !== COMMANDS_FILE_NAME)
      .map(([, filePath]) => filePath);
    if (files.length > 0) {
      result.set(bundle.name, files);
    }
  }
  return result;
}

/**
 * commands.json of each bundle that has one, by bundle name
 */
export function getBundleCommandsFiles(bundles: readonly BundleInfo[]): Map<string, string> {
  const result = new Map<string, string>();
  for (const bundle of bundles) {
    const commandsFile = path.join(bundle.envDir, COMMANDS_FILE_NAME);
    if (isFile(commandsFile)) {
      result.set(bundle.name, commandsFile);
    }
  }
  return result;
}
