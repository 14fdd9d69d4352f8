/**
 * WrapperConfig Model
 *
 * One invocation's execution settings. Built once by the caller, frozen by
 * resolveWrapperConfig(), never changed during a run.
 */

import { IsolationMode } from './environment';
import { ExecutionResult } from './execution-result';
import { WrapperLogger } from '../logging';

/**
 * Lifecycle callbacks.
 *
 * Calling contract:
 * - preRun(): awaited before the environment is composed. A throw is logged
 *   and aborts the run with PreRunError unless continueOnPreRunError is set.
 * - postRun(result): awaited exactly once after the child is gone, whatever
 *   the outcome. A throw is logged and raised as PostRunError only when
 *   continueOnPostRunError is off.
 * - onStart(pid), onOutput(line), onError(line): called synchronously;
 *   a throw is logged and otherwise ignored.
 */
export interface WrapperHooks {
  preRun?: () => void | Promise<void>;
  postRun?: (result: ExecutionResult) => void | Promise<void>;
  onStart?: (pid: number) => void;
  onOutput?: (line: string) => void;
  onError?: (line: string) => void;
}

export interface WrapperConfig {
  // Core settings
  executable: string;
  args: string[];

  // Environment
  envFiles: string[];
  /** Explicit overrides: highest precedence, not template-expanded */
  env: Record<string, string>;
  isolation: IsolationMode;
  allowlist: string[];
  /** Launcher environment used for the seed (default: process.env) */
  sourceEnv?: NodeJS.ProcessEnv;

  // Working directory
  cwd?: string;

  // Output handling
  captureOutput: boolean;
  streamOutput: boolean;

  // Execution control
  timeoutMs?: number;
  shell: boolean;
  killGracePeriodMs: number;
  interruptSignals: NodeJS.Signals[];

  // Callbacks
  hooks: WrapperHooks;

  // Error handling
  raiseOnError: boolean;
  continueOnPreRunError: boolean;
  continueOnPostRunError: boolean;

  // Logging
  logger?: WrapperLogger;
}

/**
 * What callers supply: the executable plus any settings to change
 */
export type WrapperConfigInput = Pick<WrapperConfig, 'executable'> & Partial<Omit<WrapperConfig, 'executable'>>;
