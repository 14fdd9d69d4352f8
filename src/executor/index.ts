export {
  resolveExecutable,
  resolveExecutableInEnvironment,
  isExecutableFile,
  lookupVariable,
  type ResolveExecutableOptions,
} from './executable-resolver';
export { drainLines, joinCaptured, type DrainLinesOptions } from './output-streamer';
export { SignalScope, withSignalScope, type SignalHandler } from './signal-scope';
export {
  ProcessController,
  toReturnCode,
  type ProcessControllerOptions,
  type ProcessOutcome,
  type ExitStatus,
} from './process-controller';
