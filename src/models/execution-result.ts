/**
 * ExecutionResult Model
 *
 * Created with sentinel values when a run starts, filled in as the run
 * progresses, finalized before the post-run hook sees it.
 */

import { WrapperError } from '../errors';

/**
 * Return code reported when the child never ran or was stopped by the timeout
 */
export const TIMEOUT_RETURN_CODE = -1;

/**
 * Return code reported when an interruption signal stopped the child
 */
export const INTERRUPTED_RETURN_CODE = -2;

export class ExecutionResult {
  returnCode: number = TIMEOUT_RETURN_CODE;
  stdout?: string;
  stderr?: string;
  executionTimeMs = 0;
  pid?: number;
  command: string[] = [];
  timedOut = false;
  interrupted = false;
  /** Failure that aborted composing or spawning, recorded in permissive mode */
  error?: WrapperError;

  get success(): boolean {
    return this.returnCode === 0 && !this.timedOut;
  }

  /**
   * Command line as one string, for messages
   */
  commandLine(): string {
    return this.command.join(' ');
  }

  toString(): string {
    const status = this.success ? 'SUCCESS' : `FAILED (code=${this.returnCode})`;
    const seconds = (this.executionTimeMs / 1000).toFixed(2);
    return `ExecutionResult(${status}, time=${seconds}s, pid=${this.pid ?? 'none'})`;
  }
}
