/**
 * Output streamer unit tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { PassThrough, Readable } from 'stream';
import { drainLines, joinCaptured } from '../../../src/executor/output-streamer';
import { MemorySink } from '../../helpers/fixtures';

describe('drainLines()', () => {
  it('should split on LF and CRLF and trim trailing whitespace', async () => {
    const lines = await drainLines(Readable.from(['first\r\nsec', 'ond  \n', 'last']), { capture: true });
    assert.deepEqual(lines, ['first', 'second', 'last']);
  });

  it('should echo each line to the sink and call onLine in order', async () => {
    const sink = new MemorySink();
    const seen: string[] = [];

    const lines = await drainLines(Readable.from(['a\nb\n']), {
      capture: false,
      echo: sink,
      onLine: (line) => seen.push(line),
    });

    assert.deepEqual(lines, []);
    assert.deepEqual(seen, ['a', 'b']);
    assert.equal(sink.text(), 'a\nb\n');
  });

  it('should report callback failures without stopping the drain', async () => {
    const failures: unknown[] = [];

    const lines = await drainLines(Readable.from(['ok\nbad\nok again\n']), {
      capture: true,
      onLine: (line) => {
        if (line === 'bad') {
          throw new Error('callback failure');
        }
      },
      onCallbackError: (error) => failures.push(error),
    });

    assert.deepEqual(lines, ['ok', 'bad', 'ok again']);
    assert.equal(failures.length, 1);
    assert.ok(failures[0] instanceof Error);
  });

  it('should reject when the input stream fails', async () => {
    const input = new PassThrough();
    const drained = drainLines(input, { capture: true });

    input.write('partial\n');
    input.destroy(new Error('pipe broke'));

    await assert.rejects(drained, /pipe broke/);
  });
});

describe('drainLines() with an abort signal', () => {
  it('should resolve with the lines read so far and destroy an input that stays open', async () => {
    const input = new PassThrough();
    const controller = new AbortController();
    const drained = drainLines(input, { capture: true, signal: controller.signal });

    input.write('one\ntwo\n');
    await new Promise((resolve) => setImmediate(resolve));
    controller.abort();

    assert.deepEqual(await drained, ['one', 'two']);
    assert.equal(input.destroyed, true);
  });

  it('should stop at once when the signal is already aborted', async () => {
    const input = new PassThrough();
    const controller = new AbortController();
    controller.abort();

    assert.deepEqual(await drainLines(input, { capture: true, signal: controller.signal }), []);
    assert.equal(input.destroyed, true);
  });
});

describe('joinCaptured()', () => {
  it('should join with newlines', () => {
    assert.equal(joinCaptured(['a', 'b']), 'a\nb');
  });

  it('should return undefined for empty output', () => {
    assert.equal(joinCaptured([]), undefined);
    assert.equal(joinCaptured(['']), undefined);
  });
});
