/**
 * Signal Scope
 *
 * Installs interruption listeners for exactly the duration of one
 * supervised run. While a listener is attached Node does not apply its
 * default disposition (exit) for that signal; removing it restores
 * whatever was there before.
 */

export type SignalHandler = (signal: NodeJS.Signals) => void;

export class SignalScope {
  private readonly signals: readonly NodeJS.Signals[];
  private readonly handler: SignalHandler;
  private installed = false;

  constructor(signals: readonly NodeJS.Signals[], handler: SignalHandler) {
    this.signals = [...new Set(signals)];
    this.handler = handler;
  }

  private readonly listener = (signal: NodeJS.Signals): void => {
    this.handler(signal);
  };

  install(): void {
    if (this.installed) {
      return;
    }
    for (const signal of this.signals) {
      process.on(signal, this.listener);
    }
    this.installed = true;
  }

  restore(): void {
    if (!this.installed) {
      return;
    }
    for (const signal of this.signals) {
      process.removeListener(signal, this.listener);
    }
    this.installed = false;
  }

  isInstalled(): boolean {
    return this.installed;
  }
}

/**
 * Run `body` with the listeners installed; they are removed on every exit path
 */
export async function withSignalScope<T>(
  signals: readonly NodeJS.Signals[],
  handler: SignalHandler,
  body: () => Promise<T>
): Promise<T> {
  const scope = new SignalScope(signals, handler);
  scope.install();
  try {
    return await body();
  } finally {
    scope.restore();
  }
}
