/**
 * CLI Interface for the envoy launcher
 *
 * Options come before the command name; everything after the command
 * name is handed to the command unchanged.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Writable } from 'stream';
import { CommandNotFoundError, WrapperError, describeError } from '../errors';
import { IsolationMode } from '../models/environment';
import { loadLauncherSettings, LauncherSettings } from '../config/launcher-config';
import { WrapperLogger, getWrapperLogger } from '../logging';
import { getBundles } from '../bundles/bundle-discovery';
import { CommandDefinition, CommandRegistry, findCommandsFile } from '../commands/command-registry';
import { composeEnvironment } from '../environment';
import { resolveExecutableInEnvironment } from '../executor/executable-resolver';
import { createWrapper } from '../wrapper/application-wrapper';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export const HELP_TEXT = `
envoy - run applications inside composed environments

Usage:
  envoy [options] <command> [args...]   Run a command
  envoy --list                          List available commands
  envoy --info <command>                Show how a command is defined
  envoy --which <command>               Show the executable a command resolves to

Options:
  --commands-file, -cf <path>   commands.json to load (default: envoy_env/commands.json
                                in the current directory or a parent)
  --bundles-config, -bc <path>  Bundle list file (default: discover under ENVOY_BNDL_ROOTS)
  --passthrough, -pt            Inherit the full launcher environment
  --verbose, -v                 Log launcher decisions to stderr
  --help, -h                    Show this help
  --version                     Show the version

Environment:
  ENVOY_ALLOWLIST    Extra variables inherited in closed mode (',' or ';' separated)
  ENVOY_BNDL_ROOTS   Directories searched for bundles
  ENVOY_LOG_LEVEL    Console log level (debug, info, warn, error, silent)
`;

/**
 * CLI usage error
 */
export class CLIError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CLIError';
  }
}

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  command?: string;
  args: string[];
  list?: boolean;
  info?: string;
  which?: string;
  commandsFile?: string;
  bundlesConfig?: string;
  passthrough?: boolean;
  verbose?: boolean;
  help?: boolean;
  version?: boolean;
}

/**
 * Parse CLI arguments
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = { args: [] };

  const takeValue = (index: number, option: string): string => {
    const value = argv[index + 1];
    if (value === undefined || value.length === 0) {
      throw new CLIError(`${option} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (result.command !== undefined) {
      result.args.push(arg);
      continue;
    }

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version') {
      result.version = true;
    } else if (arg === '--list') {
      result.list = true;
    } else if (arg === '--info') {
      result.info = takeValue(i++, arg);
    } else if (arg === '--which') {
      result.which = takeValue(i++, arg);
    } else if (arg === '--commands-file' || arg === '-cf') {
      result.commandsFile = takeValue(i++, arg);
    } else if (arg === '--bundles-config' || arg === '-bc') {
      result.bundlesConfig = takeValue(i++, arg);
    } else if (arg === '--passthrough' || arg === '-pt') {
      result.passthrough = true;
    } else if (arg === '--verbose' || arg === '-v') {
      result.verbose = true;
    } else if (arg === '--') {
      const [command, ...rest] = argv.slice(i + 1);
      if (command !== undefined) {
        result.command = command;
        result.args.push(...rest);
      }
      break;
    } else if (arg.startsWith('-')) {
      // Unknown options belong to the command
      result.args.push(arg);
    } else {
      result.command = arg;
    }
  }

  return result;
}

/**
 * Line-oriented output of the CLI
 */
export interface CLIOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CLIOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface CLIContext {
  /** Launcher environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory the commands file search starts from (default: process.cwd()) */
  cwd?: string;
  output?: CLIOutput;
  logger?: WrapperLogger;
  /** Streams for child output when a command captures nothing */
  stdoutSink?: Writable;
  stderrSink?: Writable;
}

export class CLI {
  private readonly env: NodeJS.ProcessEnv;
  private readonly cwd: string;
  private readonly output: CLIOutput;
  private readonly logger: WrapperLogger;
  private readonly settings: LauncherSettings;
  private readonly context: CLIContext;

  constructor(context: CLIContext = {}) {
    this.context = context;
    this.env = context.env ?? process.env;
    this.cwd = context.cwd ?? process.cwd();
    this.output = context.output ?? consoleOutput;
    this.logger = context.logger ?? getWrapperLogger();
    this.settings = loadLauncherSettings(this.env);
  }

  /**
   * Run the CLI; resolves with the exit code
   */
  async run(argv: readonly string[]): Promise<number> {
    let args: ParsedArgs;
    try {
      args = parseArgs(argv);
    } catch (error) {
      this.output.err(`Error: ${describeError(error)}`);
      this.output.err(HELP_TEXT);
      return EXIT_FAILURE;
    }

    if (args.help) {
      this.output.out(HELP_TEXT);
      return EXIT_SUCCESS;
    }
    if (args.version) {
      this.output.out(readPackageVersion());
      return EXIT_SUCCESS;
    }

    this.logger.setConsoleLevel(args.verbose ? 'debug' : this.settings.logLevel ?? 'warn');

    let registry: CommandRegistry;
    try {
      registry = this.loadCommands(args);
    } catch (error) {
      this.output.err(`Error loading commands: ${describeError(error)}`);
      return EXIT_FAILURE;
    }

    if (registry.size === 0) {
      this.output.err('Error: No commands loaded');
      return EXIT_FAILURE;
    }

    if (args.list) {
      return this.listCommands(registry);
    }
    if (args.info !== undefined) {
      return this.showInfo(registry, args.info);
    }

    const isolation: IsolationMode = args.passthrough ? 'passthrough' : 'closed';
    if (this.settings.allowlist.length > 0) {
      this.logger.debug('CLI', `Allowlist: ${[...this.settings.allowlist].sort().join(', ')}`);
    }

    if (args.which !== undefined) {
      return this.showWhich(registry, args.which, isolation);
    }

    if (args.command === undefined) {
      this.output.out(HELP_TEXT);
      return EXIT_SUCCESS;
    }

    return this.runCommand(registry, args.command, args.args, isolation);
  }

  /**
   * Bundle config file, then an explicit commands file, then auto-discovery
   * with a fallback to the nearest envoy_env/commands.json
   */
  private loadCommands(args: ParsedArgs): CommandRegistry {
    const registry = new CommandRegistry({ logger: this.logger });

    if (args.bundlesConfig !== undefined) {
      const bundles = getBundles({ configFile: path.resolve(this.cwd, args.bundlesConfig), logger: this.logger });
      if (bundles.length === 0) {
        this.logger.warn('CLI', 'No bundles found in config file');
      }
      registry.loadFromBundles(bundles);
      return registry;
    }

    if (args.commandsFile !== undefined) {
      registry.loadFromFile(path.resolve(this.cwd, args.commandsFile));
      return registry;
    }

    const bundles = getBundles({ roots: this.settings.bundleRoots, logger: this.logger });
    if (bundles.length > 0) {
      this.logger.info('CLI', `Auto-discovered ${bundles.length} bundle(s)`);
      registry.loadFromBundles(bundles);
    }
    if (registry.size > 0) {
      return registry;
    }

    const commandsFile = findCommandsFile(this.cwd);
    if (commandsFile === undefined) {
      throw new CLIError(
        'could not find envoy_env/commands.json in the current directory or its parents; ' +
          'pass --commands-file or set ENVOY_BNDL_ROOTS'
      );
    }
    const fallback = new CommandRegistry({ logger: this.logger });
    fallback.loadFromFile(commandsFile);
    return fallback;
  }

  listCommands(registry: CommandRegistry): number {
    this.output.out('Available commands:');
    this.output.out('');

    for (const name of registry.list()) {
      const command = registry.get(name);
      if (!command) {
        continue;
      }
      const bundle = command.bundle ? ` [${command.bundle}]` : '';
      const target = command.alias ? `→ ${command.alias.join(' ')}` : command.executable;
      this.output.out(`  ${name.padEnd(20)} ${target}${bundle}`);
    }

    return EXIT_SUCCESS;
  }

  showInfo(registry: CommandRegistry, name: string): number {
    const command = this.lookup(registry, name);
    if (!command) {
      return EXIT_FAILURE;
    }

    this.output.out(`Command: ${name}`);
    if (command.bundle) {
      this.output.out(`Bundle: ${command.bundle}`);
    }
    this.output.out(`Executable: ${command.executable}`);
    if (command.baseArgs.length > 0) {
      this.output.out(`Base args: ${command.baseArgs.join(' ')}`);
    }
    this.output.out('Environment files:');
    for (const file of command.environment) {
      this.output.out(`  - ${file}`);
    }
    this.output.out(`Environment directory: ${command.envDir}`);
    if (command.alias) {
      this.output.out(`Alias: ${command.alias.join(' ')}`);
    }

    return EXIT_SUCCESS;
  }

  /**
   * Resolve a command's executable against the PATH its environment defines
   */
  showWhich(registry: CommandRegistry, name: string, isolation: IsolationMode): number {
    const command = this.lookup(registry, name);
    if (!command) {
      return EXIT_FAILURE;
    }

    if (command.alias) {
      this.output.out(`command ${name} aliased to: ${command.alias.join(' ')}`);
      return EXIT_SUCCESS;
    }

    let env: Record<string, string> = {};
    try {
      env = composeEnvironment({
        envFiles: registry.resolveEnvFiles(command),
        isolation,
        allowlist: this.settings.allowlist,
        sourceEnv: this.env,
        logger: this.logger,
      });
    } catch (error) {
      this.output.err(`Warning: Could not build environment: ${describeError(error)}`);
    }

    try {
      const resolved = resolveExecutableInEnvironment(command.executable, env, { cwd: this.cwd });
      this.output.out(`command ${name} resolved to: ${resolved}`);
    } catch (error) {
      if (!(error instanceof WrapperError)) {
        throw error;
      }
      this.output.out(`command ${name} executable: ${command.executable} (not found on PATH)`);
    }

    return EXIT_SUCCESS;
  }

  async runCommand(
    registry: CommandRegistry,
    name: string,
    extraArgs: readonly string[],
    isolation: IsolationMode
  ): Promise<number> {
    const command = this.lookup(registry, name);
    if (!command) {
      this.output.err(`Run 'envoy --list' to see available commands`);
      return EXIT_FAILURE;
    }

    const invocation = registry.buildInvocation(command, extraArgs);
    const wrapper = createWrapper(
      invocation.executable,
      invocation.args,
      {
        envFiles: registry.resolveEnvFiles(command),
        isolation,
        allowlist: this.settings.allowlist,
        sourceEnv: this.env,
        cwd: this.cwd,
        captureOutput: false,
        streamOutput: this.context.stdoutSink !== undefined || this.context.stderrSink !== undefined,
        raiseOnError: false,
        logger: this.logger,
      },
      { stdoutSink: this.context.stdoutSink, stderrSink: this.context.stderrSink }
    );

    try {
      const result = await wrapper.run();
      if (result.error) {
        this.output.err(`Error: ${result.error.message}`);
        return EXIT_FAILURE;
      }
      if (result.interrupted) {
        this.output.err('Interrupted');
        return EXIT_INTERRUPTED;
      }
      return result.returnCode >= 0 ? result.returnCode : EXIT_FAILURE;
    } catch (error) {
      if (error instanceof WrapperError) {
        this.output.err(`Error: ${error.message}`);
        return EXIT_FAILURE;
      }
      throw error;
    }
  }

  private lookup(registry: CommandRegistry, name: string): CommandDefinition | undefined {
    try {
      return registry.resolveCommand(name);
    } catch (error) {
      if (!(error instanceof CommandNotFoundError)) {
        throw error;
      }
      this.output.err(`Error: Command '${error.commandName}' not found`);
      return undefined;
    }
  }
}

/**
 * Version of the nearest package.json above this module
 */
export function readPackageVersion(startDir: string = __dirname): string {
  let current = startDir;
  for (;;) {
    const candidate = path.join(current, 'package.json');
    if (fs.existsSync(candidate)) {
      const data: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
      if (typeof data === 'object' && data !== null) {
        const version: unknown = Reflect.get(data, 'version');
        if (typeof version === 'string') {
          return version;
        }
      }
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return '0.0.0';
    }
    current = parent;
  }
}
