/**
 * Process Controller
 *
 * Spawns one child with a composed environment and supervises it until it
 * is gone:
 * - stdout/stderr drained concurrently, line by line
 * - deadline measured from spawn, cleared when the child exits
 * - outcome decided by the child's exit; pipes still held open by a
 *   grandchild are read for a short window, then closed
 * - interruption signals forwarded as a terminate request
 * - terminate = SIGTERM, grace period, SIGKILL, wait for exit
 *
 * The controller never leaves a child behind: every exit path from run()
 * waits for the child's exit.
 */

import { spawn, ChildProcess } from 'child_process';
import * as os from 'os';
import { Writable } from 'stream';
import { SpawnError, describeError } from '../errors';
import { EnvironmentMapping } from '../models/environment';
import { WrapperHooks } from '../models/wrapper-config';
import { TIMEOUT_RETURN_CODE, INTERRUPTED_RETURN_CODE } from '../models/execution-result';
import { DEFAULT_KILL_GRACE_PERIOD_MS } from '../config/launcher-config';
import { WrapperLogger, getWrapperLogger } from '../logging';
import { drainLines, joinCaptured } from './output-streamer';
import { withSignalScope } from './signal-scope';

export interface ProcessControllerOptions {
  cwd?: string;
  shell?: boolean;
  captureOutput?: boolean;
  streamOutput?: boolean;
  timeoutMs?: number;
  killGracePeriodMs?: number;
  interruptSignals?: readonly NodeJS.Signals[];
  hooks?: Pick<WrapperHooks, 'onStart' | 'onOutput' | 'onError'>;
  logger?: WrapperLogger;
  runId?: string;
  /** Console stream for streamed stdout lines (default: process.stdout) */
  stdoutSink?: Writable;
  /** Console stream for streamed stderr lines (default: process.stderr) */
  stderrSink?: Writable;
  /** How long output may keep flowing after the child has exited */
  drainTimeoutMs?: number;
}

/**
 * What the controller observed about one child
 */
export interface ProcessOutcome {
  returnCode: number;
  pid?: number;
  stdout?: string;
  stderr?: string;
  timedOut: boolean;
  interrupted: boolean;
  /** Signal that ended the child, when it did not exit on its own */
  signal?: NodeJS.Signals;
}

/**
 * Default window for reading the rest of the output once the child has exited
 */
export const DEFAULT_DRAIN_TIMEOUT_MS = 500;

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Per-run bookkeeping; dropped when run() returns
 */
interface ActiveRun {
  child: ChildProcess;
  exited: Promise<ExitStatus>;
  termination?: Promise<void>;
  timedOut: boolean;
  interrupted: boolean;
}

export class ProcessController {
  private readonly options: ProcessControllerOptions;
  private readonly logger: WrapperLogger;
  private active: ActiveRun | null = null;
  private busy = false;

  constructor(options: ProcessControllerOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? getWrapperLogger();
  }

  isRunning(): boolean {
    return this.busy;
  }

  /**
   * Pid of the supervised child, if one is running
   */
  getPid(): number | undefined {
    return this.active?.child.pid;
  }

  /**
   * Spawn `command` (resolved executable first) and supervise it to the end
   */
  async run(command: readonly string[], env: EnvironmentMapping): Promise<ProcessOutcome> {
    if (this.busy) {
      throw new SpawnError('a process is already running on this controller');
    }
    if (command.length === 0) {
      throw new SpawnError('empty command');
    }

    this.busy = true;
    try {
      return await this.supervise(command, env);
    } finally {
      this.active = null;
      this.busy = false;
    }
  }

  private async supervise(command: readonly string[], env: EnvironmentMapping): Promise<ProcessOutcome> {
    const [file, ...args] = command;
    const captureOutput = this.options.captureOutput ?? false;
    const streamOutput = this.options.streamOutput ?? true;
    const piped = captureOutput || streamOutput;
    const runId = this.options.runId;

    let child: ChildProcess;
    try {
      child = spawn(file, args, {
        cwd: this.options.cwd,
        env,
        shell: this.options.shell ?? false,
        stdio: piped ? ['inherit', 'pipe', 'pipe'] : 'inherit',
        windowsHide: true,
      });
    } catch (error) {
      throw new SpawnError(`${file} (${describeError(error)})`, error);
    }

    const exited = new Promise<ExitStatus>((resolve) => {
      child.once('exit', (code, signal) => resolve({ code, signal }));
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.removeListener('error', onError);
        resolve();
      };
      const onError = (error: Error): void => {
        child.removeListener('spawn', onSpawn);
        reject(new SpawnError(`${file} (${error.message})`, error));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    child.on('error', (error: Error) => {
      this.logger.logError('Child process error', error, { category: 'SPAWN', runId });
    });

    const pid = child.pid;
    this.logger.info('SPAWN', `Started process ${pid ?? 'unknown'}: ${command.join(' ')}`, { pid, command }, runId);

    const state: ActiveRun = { child, exited, timedOut: false, interrupted: false };
    this.active = state;

    // Pipes may outlive the child when a grandchild inherits them
    const stopDrains = new AbortController();
    const drains = Promise.all([
      child.stdout
        ? drainLines(child.stdout, {
            capture: captureOutput,
            echo: streamOutput ? this.options.stdoutSink ?? process.stdout : undefined,
            onLine: this.options.hooks?.onOutput,
            onCallbackError: (error) => this.logCallbackError('onOutput', error),
            signal: stopDrains.signal,
          })
        : Promise.resolve<string[]>([]),
      child.stderr
        ? drainLines(child.stderr, {
            capture: captureOutput,
            echo: streamOutput ? this.options.stderrSink ?? process.stderr : undefined,
            onLine: this.options.hooks?.onError,
            onCallbackError: (error) => this.logCallbackError('onError', error),
            signal: stopDrains.signal,
          })
        : Promise.resolve<string[]>([]),
    ]);
    // Awaited after exit; a pipe error must not surface as unhandled before then
    drains.catch(() => undefined);

    if (pid !== undefined && this.options.hooks?.onStart) {
      this.guardCallback('onStart', () => this.options.hooks?.onStart?.(pid));
    }

    let timer: NodeJS.Timeout | undefined;
    if (this.options.timeoutMs !== undefined) {
      const timeoutMs = this.options.timeoutMs;
      timer = setTimeout(() => {
        if (hasExited(child)) {
          return;
        }
        state.timedOut = true;
        this.logger.warn('TERMINATION', `Process ${pid ?? 'unknown'} timed out after ${timeoutMs}ms`, { pid, timeoutMs }, runId);
        this.terminateRun(state).catch((error: unknown) => {
          this.logger.logError('Termination after timeout failed', error, { category: 'TERMINATION', runId });
        });
      }, timeoutMs);
    }

    const interruptSignals: readonly NodeJS.Signals[] = this.options.interruptSignals ?? ['SIGINT'];

    try {
      const status = await withSignalScope(
        interruptSignals,
        (signal) => {
          if (hasExited(child)) {
            return;
          }
          state.interrupted = true;
          this.logger.warn('TERMINATION', `Received ${signal}, terminating process ${pid ?? 'unknown'}`, { pid, signal }, runId);
          this.terminateRun(state).catch((error: unknown) => {
            this.logger.logError('Termination after interruption failed', error, { category: 'TERMINATION', runId });
          });
        },
        async () => {
          const exitStatus = await exited;
          if (timer !== undefined) {
            clearTimeout(timer);
          }
          if (state.termination) {
            await state.termination;
          }
          return exitStatus;
        }
      );

      const drainTimeoutMs = this.options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
      if (!(await waitFor(drains, drainTimeoutMs))) {
        this.logger.debug('OUTPUT', `Output of process ${pid ?? 'unknown'} still open ${drainTimeoutMs}ms after exit, closing pipes`, { pid }, runId);
        stopDrains.abort();
      }
      const [stdoutLines, stderrLines] = await drains;

      const outcome: ProcessOutcome = {
        returnCode: toReturnCode(status),
        pid,
        stdout: captureOutput ? joinCaptured(stdoutLines) : undefined,
        stderr: captureOutput ? joinCaptured(stderrLines) : undefined,
        timedOut: state.timedOut,
        interrupted: state.interrupted,
        signal: status.signal ?? undefined,
      };

      if (state.timedOut) {
        outcome.returnCode = TIMEOUT_RETURN_CODE;
      } else if (state.interrupted) {
        outcome.returnCode = INTERRUPTED_RETURN_CODE;
      }

      this.logger.info('SPAWN', `Process ${pid ?? 'unknown'} finished with code ${outcome.returnCode}`, {
        pid,
        returnCode: outcome.returnCode,
        signal: outcome.signal,
        timedOut: outcome.timedOut,
        interrupted: outcome.interrupted,
      }, runId);

      return outcome;
    } finally {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      if (!hasExited(child)) {
        await this.terminateRun(state);
      } else if (state.termination) {
        await state.termination;
      }
      stopDrains.abort();
    }
  }

  /**
   * Ask the running child to stop; resolves once it has exited
   */
  async terminate(): Promise<void> {
    if (this.active) {
      await this.terminateRun(this.active);
    }
  }

  private terminateRun(state: ActiveRun): Promise<void> {
    if (!state.termination) {
      state.termination = this.escalate(state);
    }
    return state.termination;
  }

  private async escalate(state: ActiveRun): Promise<void> {
    const { child, exited } = state;
    const pid = child.pid;
    const runId = this.options.runId;

    if (hasExited(child)) {
      return;
    }

    const graceMs = this.options.killGracePeriodMs ?? DEFAULT_KILL_GRACE_PERIOD_MS;
    this.logger.info('TERMINATION', `Sending SIGTERM to process ${pid ?? 'unknown'}`, { pid, graceMs }, runId);
    sendSignal(child, 'SIGTERM');

    if (await waitFor(exited, graceMs)) {
      return;
    }

    this.logger.warn('TERMINATION', `Process ${pid ?? 'unknown'} still running after ${graceMs}ms, sending SIGKILL`, { pid }, runId);
    sendSignal(child, 'SIGKILL');
    await exited;
  }

  private guardCallback(name: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logCallbackError(name, error);
    }
  }

  private logCallbackError(name: string, error: unknown): void {
    this.logger.logError(`${name} callback failed`, error, { category: 'OUTPUT', runId: this.options.runId });
  }
}

function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

function sendSignal(child: ChildProcess, signal: NodeJS.Signals): void {
  if (!hasExited(child)) {
    child.kill(signal);
  }
}

/**
 * Resolves true if `promise` settles within `ms`, false otherwise
 */
function waitFor(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    const settled = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    promise.then(settled, settled);
  });
}

/**
 * Native exit code, or the negated signal number for a signal death
 */
export function toReturnCode(status: ExitStatus): number {
  if (status.code !== null) {
    return status.code;
  }
  if (status.signal !== null) {
    const signalNumber: unknown = Reflect.get(os.constants.signals, status.signal);
    return typeof signalNumber === 'number' ? -signalNumber : TIMEOUT_RETURN_CODE;
  }
  return TIMEOUT_RETURN_CODE;
}
