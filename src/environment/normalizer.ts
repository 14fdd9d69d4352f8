/**
 * Value Normalizer
 *
 * Turns a raw environment file value into the single string stored in the
 * mapping. Lists become path lists joined with the platform separator.
 */

import { ConfigValue } from '../models/environment';

/**
 * Path-list separator for a platform: ';' on Windows, ':' elsewhere
 */
export function pathListSeparator(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? ';' : ':';
}

/**
 * Stringify a scalar or join a list of scalars
 */
export function normalizeValue(value: ConfigValue, separator: string): string {
  if (Array.isArray(value)) {
    return value.map((item) => String(item)).join(separator);
  }
  return String(value);
}

/**
 * Split a path-list string, dropping empty segments
 */
export function splitPathList(value: string, separator: string): string[] {
  return value
    .split(separator)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}
