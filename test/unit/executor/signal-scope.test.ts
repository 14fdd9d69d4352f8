/**
 * Signal scope unit tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { SignalScope, withSignalScope } from '../../../src/executor/signal-scope';

describe('SignalScope', () => {
  it('should add listeners on install and remove them on restore', () => {
    const before = process.listenerCount('SIGUSR2');
    const scope = new SignalScope(['SIGUSR2', 'SIGUSR2'], () => undefined);

    scope.install();
    assert.equal(scope.isInstalled(), true);
    assert.equal(process.listenerCount('SIGUSR2'), before + 1);

    scope.install();
    assert.equal(process.listenerCount('SIGUSR2'), before + 1);

    scope.restore();
    assert.equal(scope.isInstalled(), false);
    assert.equal(process.listenerCount('SIGUSR2'), before);
  });

  it('should hand delivered signals to the handler', () => {
    const received: NodeJS.Signals[] = [];
    const scope = new SignalScope(['SIGUSR2'], (signal) => received.push(signal));

    scope.install();
    try {
      process.emit('SIGUSR2', 'SIGUSR2');
    } finally {
      scope.restore();
    }

    assert.deepEqual(received, ['SIGUSR2']);
  });
});

describe('withSignalScope()', () => {
  it('should remove its listeners when the body resolves', async () => {
    const before = process.listenerCount('SIGUSR2');

    const value = await withSignalScope(['SIGUSR2'], () => undefined, async () => {
      assert.equal(process.listenerCount('SIGUSR2'), before + 1);
      return 'done';
    });

    assert.equal(value, 'done');
    assert.equal(process.listenerCount('SIGUSR2'), before);
  });

  it('should remove its listeners when the body rejects', async () => {
    const before = process.listenerCount('SIGUSR2');

    await assert.rejects(
      withSignalScope(['SIGUSR2'], () => undefined, async () => {
        throw new Error('body failed');
      }),
      /body failed/
    );

    assert.equal(process.listenerCount('SIGUSR2'), before);
  });
});
