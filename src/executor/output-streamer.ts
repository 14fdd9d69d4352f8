/**
 * Output Streamer
 *
 * Drains one child pipe line by line. stdout and stderr each get their own
 * drain and run concurrently, so a child blocked on a full stderr pipe can
 * never stall a reader still waiting on stdout. Lines of one stream keep
 * their order; lines of different streams interleave as they arrive.
 */

import * as readline from 'readline';
import { Readable, Writable } from 'stream';

export interface DrainLinesOptions {
  /** Collect lines for the result */
  capture: boolean;
  /** Echo each line to this stream (streaming mode) */
  echo?: Writable;
  /** Per-line callback */
  onLine?: (line: string) => void;
  /** Receives a callback's failure; the failure goes no further */
  onCallbackError?: (error: unknown) => void;
  /** Stop early: resolve with the lines read so far and destroy the input */
  signal?: AbortSignal;
}

/**
 * Read `input` to its end; resolves with the captured lines
 */
export function drainLines(input: Readable, options: DrainLinesOptions): Promise<string[]> {
  return new Promise<string[]>((resolve, reject) => {
    const lines: string[] = [];
    const rl = readline.createInterface({ input, crlfDelay: Infinity });

    rl.on('line', (raw: string) => {
      const line = raw.trimEnd();

      if (options.capture) {
        lines.push(line);
      }

      if (options.echo) {
        options.echo.write(line + '\n');
      }

      if (options.onLine) {
        try {
          options.onLine(line);
        } catch (error) {
          options.onCallbackError?.(error);
        }
      }
    });

    let failed = false;
    const fail = (error: Error): void => {
      if (failed) {
        return;
      }
      failed = true;
      reject(error);
      rl.close();
    };

    const stop = (): void => {
      rl.close();
      input.destroy();
    };

    // readline re-emits input errors on the interface
    input.once('error', fail);
    rl.once('error', fail);
    rl.once('close', () => {
      options.signal?.removeEventListener('abort', stop);
      resolve(lines);
    });

    if (options.signal?.aborted) {
      stop();
    } else {
      options.signal?.addEventListener('abort', stop, { once: true });
    }
  });
}

/**
 * Join captured lines; empty output yields undefined
 */
export function joinCaptured(lines: readonly string[]): string | undefined {
  const joined = lines.join('\n');
  return joined.length > 0 ? joined : undefined;
}
