/**
 * Executable Resolver
 *
 * Resolves a requested executable against the search path of the child's
 * composed environment, never the launcher's own PATH: a closed environment
 * that redefines PATH must get the executable that PATH names.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ExecutableNotFoundError } from '../errors';
import { EnvironmentMapping } from '../models/environment';
import { pathListSeparator, splitPathList } from '../environment/normalizer';

const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

export interface ResolveExecutableOptions {
  /** Search path string (the composed PATH); undefined means nothing to search */
  searchPath?: string;
  /** Directory relative requests are resolved against (default: process.cwd()) */
  cwd?: string;
  /** Executable extensions to try on Windows (the composed PATHEXT) */
  pathExt?: string;
  platform?: NodeJS.Platform;
}

/**
 * True for a regular file the current user may execute
 */
export function isExecutableFile(filePath: string, platform: NodeJS.Platform = process.platform): boolean {
  try {
    const stat = fs.statSync(filePath);
    if (!stat.isFile()) {
      return false;
    }
    if (platform !== 'win32') {
      fs.accessSync(filePath, fs.constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve an executable to an absolute path
 *
 * - Absolute paths and paths with a directory part must exist as given
 * - Bare names are looked up in each directory of the search path
 */
export function resolveExecutable(executable: string, options: ResolveExecutableOptions = {}): string {
  const platform = options.platform ?? process.platform;

  if (path.isAbsolute(executable) || hasDirectoryPart(executable, platform)) {
    const candidate = path.resolve(options.cwd ?? process.cwd(), executable);
    if (!fs.existsSync(candidate)) {
      throw new ExecutableNotFoundError(executable, `does not exist (${candidate})`);
    }
    return candidate;
  }

  const directories = splitPathList(options.searchPath ?? '', pathListSeparator(platform));
  const extensions = executableExtensions(executable, options.pathExt, platform);

  for (const directory of directories) {
    for (const extension of extensions) {
      const candidate = path.resolve(options.cwd ?? process.cwd(), directory, executable + extension);
      if (isExecutableFile(candidate, platform)) {
        return candidate;
      }
    }
  }

  throw new ExecutableNotFoundError(executable, 'not found in PATH');
}

/**
 * Resolve against a composed environment's PATH (and PATHEXT on Windows)
 */
export function resolveExecutableInEnvironment(
  executable: string,
  env: EnvironmentMapping,
  options: Omit<ResolveExecutableOptions, 'searchPath' | 'pathExt'> = {}
): string {
  const platform = options.platform ?? process.platform;
  return resolveExecutable(executable, {
    ...options,
    platform,
    searchPath: lookupVariable(env, 'PATH', platform),
    pathExt: lookupVariable(env, 'PATHEXT', platform),
  });
}

/**
 * Read a variable from a mapping; names compare case-insensitively on Windows
 */
export function lookupVariable(
  env: EnvironmentMapping,
  name: string,
  platform: NodeJS.Platform = process.platform
): string | undefined {
  if (Object.prototype.hasOwnProperty.call(env, name)) {
    return env[name];
  }
  if (platform === 'win32') {
    const upper = name.toUpperCase();
    const match = Object.keys(env).find((key) => key.toUpperCase() === upper);
    return match !== undefined ? env[match] : undefined;
  }
  return undefined;
}

function hasDirectoryPart(executable: string, platform: NodeJS.Platform): boolean {
  return executable.includes('/') || (platform === 'win32' && executable.includes('\\'));
}

function executableExtensions(
  executable: string,
  pathExt: string | undefined,
  platform: NodeJS.Platform
): string[] {
  if (platform !== 'win32' || path.extname(executable).length > 0) {
    return [''];
  }
  return ['', ...splitPathList(pathExt ?? DEFAULT_PATHEXT, ';').map((ext) => ext.toLowerCase())];
}
