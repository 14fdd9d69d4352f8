/**
 * Application Wrapper
 *
 * Runs one configured invocation through its lifecycle:
 *   pre-run → compose environment → resolve → spawn → supervise → post-run
 *
 * Error policy:
 * - Pre-run failure aborts with PreRunError (unless continueOnPreRunError);
 *   it propagates even when raiseOnError is off
 * - Compose/resolve/spawn failures are recorded on the result and, with
 *   raiseOnError, rethrown once post-run has run
 * - Post-run runs exactly once; its failure propagates only when
 *   continueOnPostRunError is off, and then replaces any pending error
 * - An unsuccessful child with raiseOnError raises ExecutionError
 */

import { Writable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import {
  WrapperError,
  SpawnError,
  StateTransitionError,
  ExecutionError,
  PreRunError,
  PostRunError,
  describeError,
} from '../errors';
import { ExecutionResult } from '../models/execution-result';
import { WrapperConfig, WrapperConfigInput } from '../models/wrapper-config';
import { WrapperState, isValidStateTransition } from '../models/wrapper-state';
import { resolveWrapperConfig } from '../config/launcher-config';
import { WrapperLogger, getWrapperLogger } from '../logging';
import { EnvironmentComposer } from '../environment';
import { resolveExecutableInEnvironment } from '../executor/executable-resolver';
import { ProcessController, ProcessOutcome } from '../executor/process-controller';

export interface ApplicationWrapperOptions {
  /** Console stream for streamed stdout lines (default: process.stdout) */
  stdoutSink?: Writable;
  /** Console stream for streamed stderr lines (default: process.stderr) */
  stderrSink?: Writable;
}

export class ApplicationWrapper {
  readonly config: Readonly<WrapperConfig>;
  private readonly logger: WrapperLogger;
  private readonly sinks: ApplicationWrapperOptions;
  private state: WrapperState = WrapperState.IDLE;
  private controller: ProcessController | null = null;
  private running = false;

  constructor(config: WrapperConfigInput, options: ApplicationWrapperOptions = {}) {
    this.config = resolveWrapperConfig(config);
    this.logger = this.config.logger ?? getWrapperLogger();
    this.sinks = options;
  }

  getState(): WrapperState {
    return this.state;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Execute the configured application
   */
  async run(): Promise<ExecutionResult> {
    if (this.running) {
      throw new SpawnError('wrapper is already running');
    }
    this.running = true;

    const runId = uuidv4();
    const startTime = Date.now();
    const result = new ExecutionResult();
    let pending: WrapperError | undefined;

    try {
      this.transition(WrapperState.PRE_RUN, runId);
      await this.executePreRun(runId);

      let outcome: ProcessOutcome | undefined;
      try {
        outcome = await this.execute(result, runId);
      } catch (error) {
        result.executionTimeMs = Date.now() - startTime;
        result.error = asWrapperError(error);
        this.logger.logError('Execution failed', error, { category: 'ERROR', runId });
        this.transition(WrapperState.SPAWN_FAILED, runId);
        if (this.config.raiseOnError) {
          pending = result.error;
        }
      }

      if (outcome) {
        this.applyOutcome(result, outcome);
        result.executionTimeMs = Date.now() - startTime;
        // onStart is skipped when the OS reports no pid
        this.transition(WrapperState.RUNNING, runId);
        this.transition(outcomeState(outcome), runId);
        this.logger.info('SPAWN', `Process finished: ${result.toString()}`, { returnCode: result.returnCode }, runId);
      }
    } catch (error) {
      // Pre-run abort or an invalid state transition; post-run still runs
      result.executionTimeMs = Date.now() - startTime;
      pending = asWrapperError(error);
    }

    try {
      this.transition(WrapperState.POST_RUN, runId);
      const postRunError = await this.executePostRun(result, runId);
      if (postRunError) {
        pending = postRunError;
      }
    } finally {
      this.controller = null;
      this.running = false;
      this.transition(WrapperState.DONE, runId);
    }

    if (pending) {
      throw pending;
    }

    if (this.config.raiseOnError && !result.success) {
      throw this.executionError(result);
    }

    return result;
  }

  /**
   * Terminate a child still running under this wrapper
   */
  async dispose(): Promise<void> {
    if (this.controller) {
      await this.controller.terminate();
    }
  }

  private async executePreRun(runId: string): Promise<void> {
    const preRun = this.config.hooks.preRun;
    if (!preRun) {
      return;
    }

    try {
      this.logger.info('PRE_RUN', 'Executing pre-run operations', undefined, runId);
      await preRun();
      this.logger.info('PRE_RUN', 'Pre-run operations completed', undefined, runId);
    } catch (error) {
      this.logger.logError('Pre-run operation failed', error, { category: 'PRE_RUN', runId });
      if (!this.config.continueOnPreRunError) {
        throw new PreRunError(error);
      }
    }
  }

  /**
   * Returns the error to raise, if post-run failed and must propagate
   */
  private async executePostRun(result: ExecutionResult, runId: string): Promise<PostRunError | undefined> {
    const postRun = this.config.hooks.postRun;
    if (!postRun) {
      return undefined;
    }

    try {
      this.logger.info('POST_RUN', 'Executing post-run operations', undefined, runId);
      await postRun(result);
      this.logger.info('POST_RUN', 'Post-run operations completed', undefined, runId);
      return undefined;
    } catch (error) {
      this.logger.logError('Post-run operation failed', error, { category: 'POST_RUN', runId });
      return this.config.continueOnPostRunError ? undefined : new PostRunError(error);
    }
  }

  private async execute(result: ExecutionResult, runId: string): Promise<ProcessOutcome> {
    const config = this.config;

    this.transition(WrapperState.COMPOSING, runId);
    const composer = new EnvironmentComposer({
      isolation: config.isolation,
      allowlist: config.allowlist,
      sourceEnv: config.sourceEnv,
      logger: this.logger,
      runId,
    });
    const env = composer.compose({ envFiles: config.envFiles, overrides: config.env });

    this.transition(WrapperState.SPAWNING, runId);
    const resolved = resolveExecutableInEnvironment(config.executable, env, { cwd: config.cwd });
    this.logger.debug('RESOLUTION', `Resolved '${config.executable}' to ${resolved}`, {
      executable: config.executable,
      resolved,
    }, runId);

    const command = [resolved, ...config.args];
    result.command = command;
    this.logger.info('SPAWN', `Executing: ${command.join(' ')}`, { cwd: config.cwd }, runId);

    const controller = new ProcessController({
      cwd: config.cwd,
      shell: config.shell,
      captureOutput: config.captureOutput,
      streamOutput: config.streamOutput,
      timeoutMs: config.timeoutMs,
      killGracePeriodMs: config.killGracePeriodMs,
      interruptSignals: config.interruptSignals,
      hooks: {
        onStart: (pid) => {
          result.pid = pid;
          this.transition(WrapperState.RUNNING, runId);
          config.hooks.onStart?.(pid);
        },
        onOutput: config.hooks.onOutput,
        onError: config.hooks.onError,
      },
      logger: this.logger,
      runId,
      stdoutSink: this.sinks.stdoutSink,
      stderrSink: this.sinks.stderrSink,
    });
    this.controller = controller;

    return controller.run(command, env);
  }

  private applyOutcome(result: ExecutionResult, outcome: ProcessOutcome): void {
    result.returnCode = outcome.returnCode;
    result.pid = outcome.pid;
    result.stdout = outcome.stdout;
    result.stderr = outcome.stderr;
    result.timedOut = outcome.timedOut;
    result.interrupted = outcome.interrupted;
  }

  private executionError(result: ExecutionResult): ExecutionError {
    const details = {
      returnCode: result.returnCode,
      timedOut: result.timedOut,
      command: result.command,
      timeoutMs: this.config.timeoutMs,
    };
    if (result.timedOut) {
      return new ExecutionError(`Process timed out after ${this.config.timeoutMs ?? 0}ms`, details);
    }
    return new ExecutionError(
      `Process exited with code ${result.returnCode}\nCommand: ${result.commandLine()}`,
      details
    );
  }

  private transition(next: WrapperState, runId: string): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    if (!isValidStateTransition(previous, next)) {
      throw new StateTransitionError(previous, next);
    }
    this.state = next;
    this.logger.debug('SPAWN', `State ${previous} -> ${next}`, { previous, next }, runId);
  }
}

function outcomeState(outcome: ProcessOutcome): WrapperState {
  if (outcome.timedOut) {
    return WrapperState.TIMED_OUT;
  }
  if (outcome.interrupted) {
    return WrapperState.INTERRUPTED;
  }
  return WrapperState.COMPLETED;
}

/**
 * Typed launcher errors pass through; anything else becomes a SpawnError
 */
function asWrapperError(error: unknown): WrapperError {
  if (error instanceof WrapperError) {
    return error;
  }
  return new SpawnError(describeError(error), error);
}

/**
 * Build a wrapper from an executable, its arguments and optional settings
 */
export function createWrapper(
  executable: string,
  args: readonly string[] = [],
  options: Omit<WrapperConfigInput, 'executable' | 'args'> = {},
  wrapperOptions: ApplicationWrapperOptions = {}
): ApplicationWrapper {
  return new ApplicationWrapper({ ...options, executable, args: [...args] }, wrapperOptions);
}
