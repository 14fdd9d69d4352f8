/**
 * Command Registry
 *
 * Named commands read from commands.json manifests:
 *
 *   {
 *     "maya":   { "environment": ["maya_env.json"] },
 *     "node20": { "executable": "node", "args": ["--enable-source-maps"] },
 *     "lint":   { "alias": ["node", "tools/lint.js"], "environment": ["dev.yaml"] }
 *   }
 *
 * The executable defaults to the command name. An alias replaces the
 * executable with its first element and prepends the rest to the arguments.
 */

import * as fs from 'fs';
import * as path from 'path';
import { BundleConfigError, CommandNotFoundError, ConfigurationFileMissingError, describeError } from '../errors';
import { BUNDLE_ENV_DIR_NAME } from '../models/environment';
import { WrapperLogger, getWrapperLogger } from '../logging';
import { BundleInfo, COMMANDS_FILE_NAME, GLOBAL_ENV_FILE_NAME } from '../bundles/bundle-discovery';

export interface CommandDefinition {
  name: string;
  executable: string;
  /** Arguments placed before the caller's arguments */
  baseArgs: string[];
  /** Environment file names, looked up in envoy_env directories */
  environment: string[];
  /** Replacement command line */
  alias?: string[];
  /** Bundle that defined the command */
  bundle?: string;
  /** envoy_env directory of the manifest that defined the command */
  envDir: string;
}

/**
 * What to spawn for one command invocation
 */
export interface CommandInvocation {
  executable: string;
  args: string[];
}

export interface CommandRegistryOptions {
  logger?: WrapperLogger;
}

function readStringList(value: unknown, field: string, context: string): string[] {
  if (value === undefined) {
    return [];
  }
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return [...value];
  }
  throw new BundleConfigError(`${context}: "${field}" must be a string or a list of strings`);
}

/**
 * Parse one manifest; every entry must be an object
 */
export function parseCommandsFile(filePath: string, bundle?: string): CommandDefinition[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationFileMissingError(filePath);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new BundleConfigError(`${filePath}: invalid JSON (${describeError(error)})`, error);
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new BundleConfigError(`${filePath}: commands file must contain a JSON object`);
  }

  const envDir = path.dirname(path.resolve(filePath));
  const definitions: CommandDefinition[] = [];

  for (const [name, rawEntry] of Object.entries(data)) {
    const entry: unknown = rawEntry;
    const context = `${filePath}: command '${name}'`;
    if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
      throw new BundleConfigError(`${context} must be an object`);
    }

    const executable: unknown = Reflect.get(entry, 'executable');
    if (executable !== undefined && (typeof executable !== 'string' || executable.length === 0)) {
      throw new BundleConfigError(`${context}: "executable" must be a non-empty string`);
    }

    const alias = readStringList(Reflect.get(entry, 'alias'), 'alias', context);

    definitions.push({
      name,
      executable: typeof executable === 'string' ? executable : name,
      baseArgs: readStringList(Reflect.get(entry, 'args'), 'args', context),
      environment: readStringList(Reflect.get(entry, 'environment'), 'environment', context),
      alias: alias.length > 0 ? alias : undefined,
      bundle,
      envDir,
    });
  }

  return definitions;
}

export class CommandRegistry {
  private readonly commands = new Map<string, CommandDefinition>();
  private readonly logger: WrapperLogger;
  private bundles: BundleInfo[] = [];

  constructor(options: CommandRegistryOptions = {}) {
    this.logger = options.logger ?? getWrapperLogger();
  }

  /**
   * Load one manifest (single-file mode). Later definitions replace earlier ones.
   */
  loadFromFile(filePath: string): number {
    const definitions = parseCommandsFile(filePath);
    for (const definition of definitions) {
      this.commands.set(definition.name, definition);
    }
    this.logger.info('COMMANDS', `Loaded ${definitions.length} command(s) from ${filePath}`, { filePath });
    return definitions.length;
  }

  /**
   * Load every bundle's commands.json; across bundles the first definition wins
   */
  loadFromBundles(bundles: readonly BundleInfo[]): number {
    this.bundles = [...bundles];
    let loaded = 0;

    for (const bundle of bundles) {
      const commandsFile = path.join(bundle.envDir, COMMANDS_FILE_NAME);
      if (!fs.existsSync(commandsFile)) {
        continue;
      }
      for (const definition of parseCommandsFile(commandsFile, bundle.name)) {
        const existing = this.commands.get(definition.name);
        if (existing) {
          this.logger.debug('COMMANDS', `Command '${definition.name}' from ${bundle.name} shadowed by ${existing.bundle ?? 'an earlier definition'}`);
          continue;
        }
        this.commands.set(definition.name, definition);
        loaded++;
      }
    }

    this.logger.info('COMMANDS', `Loaded ${loaded} command(s) from ${bundles.length} bundle(s)`);
    return loaded;
  }

  get(name: string): CommandDefinition | undefined {
    return this.commands.get(name);
  }

  /**
   * Like get(), but an unknown name raises CommandNotFoundError
   */
  resolveCommand(name: string): CommandDefinition {
    const command = this.commands.get(name);
    if (!command) {
      throw new CommandNotFoundError(name);
    }
    return command;
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  /**
   * Command names, sorted
   */
  list(): string[] {
    return [...this.commands.keys()].sort();
  }

  get size(): number {
    return this.commands.size;
  }

  /**
   * Bundles loaded by loadFromBundles (empty in single-file mode)
   */
  getBundles(): readonly BundleInfo[] {
    return this.bundles;
  }

  /**
   * Environment files for a command, in merge order.
   *
   * Bundle mode: every bundle's global_env.json, then each named file from
   * every bundle that has it. Single-file mode: global_env.json beside the
   * manifest when present, then the named files from that directory.
   */
  resolveEnvFiles(command: CommandDefinition): string[] {
    const files: string[] = [];

    if (this.bundles.length > 0) {
      for (const bundle of this.bundles) {
        const globalEnv = bundle.envFiles.get(GLOBAL_ENV_FILE_NAME);
        if (globalEnv !== undefined) {
          files.push(globalEnv);
        }
      }
      for (const name of command.environment) {
        const matches = this.bundles.flatMap((bundle) => {
          const filePath = bundle.envFiles.get(name);
          return filePath !== undefined ? [filePath] : [];
        });
        if (matches.length === 0) {
          this.logger.warn('COMMANDS', `Environment file '${name}' of command '${command.name}' not found in any bundle`);
        }
        files.push(...matches);
      }
      return files;
    }

    const globalEnv = path.join(command.envDir, GLOBAL_ENV_FILE_NAME);
    if (fs.existsSync(globalEnv)) {
      files.push(globalEnv);
    }
    for (const name of command.environment) {
      files.push(path.join(command.envDir, name));
    }
    return files;
  }

  /**
   * Executable and arguments for running a command with extra arguments
   */
  buildInvocation(command: CommandDefinition, extraArgs: readonly string[] = []): CommandInvocation {
    if (command.alias && command.alias.length > 0) {
      const [executable, ...aliasArgs] = command.alias;
      return { executable, args: [...aliasArgs, ...command.baseArgs, ...extraArgs] };
    }
    return { executable: command.executable, args: [...command.baseArgs, ...extraArgs] };
  }
}

/**
 * Search envoy_env/commands.json in `startDir` and its parents
 */
export function findCommandsFile(startDir: string = process.cwd()): string | undefined {
  let current = path.resolve(startDir);

  for (;;) {
    const candidate = path.join(current, BUNDLE_ENV_DIR_NAME, COMMANDS_FILE_NAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}
