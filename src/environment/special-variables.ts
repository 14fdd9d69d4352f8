/**
 * Special variables computed from an environment file's location
 *
 *   __FILE__        absolute path of the file
 *   __BUNDLE__      bundle root (parent of the nearest envoy_env/ ancestor)
 *   __BUNDLE_ENV__  the envoy_env/ directory itself
 *   __BUNDLE_NAME__ name of the bundle root directory
 *
 * When no envoy_env/ ancestor exists, the file's own directory stands in
 * for both the bundle root and the bundle env directory.
 * Paths are reported with forward slashes on every platform.
 */

import * as path from 'path';
import { BUNDLE_ENV_DIR_NAME, SpecialVariables } from '../models/environment';

export function getSpecialVariables(envFilePath: string): SpecialVariables {
  const fileAbs = path.resolve(envFilePath);
  const fileDir = path.dirname(fileAbs);

  let bundleEnvDir: string | null = null;
  let current = fileDir;
  while (true) {
    if (path.basename(current) === BUNDLE_ENV_DIR_NAME) {
      bundleEnvDir = current;
      break;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  const bundleRoot = bundleEnvDir ? path.dirname(bundleEnvDir) : fileDir;

  return {
    __FILE__: toForwardSlashes(fileAbs),
    __BUNDLE__: toForwardSlashes(bundleRoot),
    __BUNDLE_ENV__: toForwardSlashes(bundleEnvDir ?? fileDir),
    __BUNDLE_NAME__: path.basename(bundleRoot),
  };
}

function toForwardSlashes(value: string): string {
  return value.replace(/\\/g, '/');
}
