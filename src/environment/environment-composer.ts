/**
 * Environment Composer
 *
 * Priority (later overrides earlier):
 * 1. Seed: core + allowlisted launcher variables (closed) or the whole
 *    launcher environment (passthrough)
 * 2. Environment files, in caller order, keys in document order
 * 3. Explicit overrides, applied verbatim
 *
 * Closed mode is an isolation boundary: a name reaches the child only if it
 * is seeded, set by a file, or overridden. Template expansion and +=/^=
 * read exclusively from the mapping under construction.
 */

import coreVariables from './core-variables.json';
import { EnvironmentMapping, IsolationMode } from '../models/environment';
import { WrapperLogger, getWrapperLogger } from '../logging';
import { mergeEnvironmentFile } from './file-merger';
import { pathListSeparator } from './normalizer';
import { VariableMap } from './variable-map';

/**
 * OS identity, locale, temp-directory and shell variables that closed mode
 * always inherits when they are set
 */
export const CORE_ENV_VARS: ReadonlySet<string> = new Set<string>(coreVariables);

export interface EnvironmentComposerOptions {
  isolation?: IsolationMode;
  /** Extra launcher variable names inherited in closed mode */
  allowlist?: Iterable<string>;
  /** Launcher environment (default: process.env); never modified */
  sourceEnv?: NodeJS.ProcessEnv;
  /** Target platform for the path-list separator and name matching (default: process.platform) */
  platform?: NodeJS.Platform;
  logger?: WrapperLogger;
  runId?: string;
}

export interface ComposeRequest {
  envFiles?: readonly string[];
  overrides?: Readonly<Record<string, string>>;
}

/**
 * Build the seed mapping for an isolation mode. On Windows closed mode
 * matches core and allowlisted names case-insensitively and keeps the
 * launcher's spelling.
 */
export function seedEnvironment(
  isolation: IsolationMode,
  allowlist: Iterable<string> = [],
  sourceEnv: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): VariableMap {
  const seed = new VariableMap(platform);

  if (isolation === 'passthrough') {
    for (const [name, value] of Object.entries(sourceEnv)) {
      if (value !== undefined) {
        seed.set(name, value);
      }
    }
    return seed;
  }

  const sourceNames = new VariableMap(platform);
  for (const name of Object.keys(sourceEnv)) {
    if (!sourceNames.has(name)) {
      sourceNames.set(name, name);
    }
  }

  const names = new Set<string>(CORE_ENV_VARS);
  for (const name of allowlist) {
    names.add(name);
  }
  for (const name of names) {
    const sourceName = Object.prototype.hasOwnProperty.call(sourceEnv, name) ? name : sourceNames.get(name);
    if (sourceName === undefined) {
      continue;
    }
    const value = sourceEnv[sourceName];
    if (value !== undefined) {
      seed.set(sourceName, value);
    }
  }
  return seed;
}

export class EnvironmentComposer {
  private readonly isolation: IsolationMode;
  private readonly allowlist: ReadonlySet<string>;
  private readonly sourceEnv: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;
  private readonly separator: string;
  private readonly logger: WrapperLogger;
  private readonly runId?: string;

  constructor(options: EnvironmentComposerOptions = {}) {
    this.isolation = options.isolation ?? 'closed';
    this.allowlist = new Set(options.allowlist ?? []);
    this.sourceEnv = options.sourceEnv ?? process.env;
    this.platform = options.platform ?? process.platform;
    this.separator = pathListSeparator(this.platform);
    this.logger = options.logger ?? getWrapperLogger();
    this.runId = options.runId;
  }

  getIsolation(): IsolationMode {
    return this.isolation;
  }

  getSeparator(): string {
    return this.separator;
  }

  /**
   * Compose the child's environment. Any failing file aborts the whole
   * composition; no partial mapping is returned.
   */
  compose(request: ComposeRequest = {}): EnvironmentMapping {
    const env = seedEnvironment(this.isolation, this.allowlist, this.sourceEnv, this.platform);
    this.logger.debug('ENVIRONMENT', `Seeded ${env.size} variable(s) in ${this.isolation} mode`, {
      isolation: this.isolation,
      seeded: [...env.keys()],
    }, this.runId);

    for (const filePath of request.envFiles ?? []) {
      const count = mergeEnvironmentFile(filePath, env, { separator: this.separator });
      this.logger.info('ENVIRONMENT', `Loaded ${count} environment variable(s) from ${filePath}`, {
        filePath,
        count,
      }, this.runId);
    }

    if (request.overrides) {
      for (const [name, value] of Object.entries(request.overrides)) {
        env.set(name, value);
      }
    }

    return Object.fromEntries(env);
  }
}

/**
 * One-shot composition
 */
export function composeEnvironment(
  request: ComposeRequest & EnvironmentComposerOptions
): EnvironmentMapping {
  const { envFiles, overrides, ...options } = request;
  return new EnvironmentComposer(options).compose({ envFiles, overrides });
}
