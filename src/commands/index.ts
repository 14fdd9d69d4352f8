export {
  CommandRegistry,
  parseCommandsFile,
  findCommandsFile,
  type CommandDefinition,
  type CommandInvocation,
  type CommandRegistryOptions,
} from './command-registry';
