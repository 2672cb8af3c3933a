/**
 * @module executor/cancellation
 * Turns user interrupts into cancellation of the batch in flight.
 *
 * A bridge is created per submission. It arms one interrupt listener, hands
 * the submission an `AbortSignal`, and retires the listener once the
 * submission has returned, whichever way it returned. An interrupt that
 * arrives first aborts the signal; the bridge still waits for the submission
 * to come back before retiring, so no listener outlives its submission.
 */

import { InterruptNotifier } from '../batch/source';

export type BridgeState = 'armed' | 'retired';

/**
 * Listens for `SIGINT` and `SIGTERM` on the current process.
 *
 * While a listener is subscribed, those signals no longer terminate the
 * process.
 */
export class ProcessSignalNotifier implements InterruptNotifier {
  private readonly signals: readonly NodeJS.Signals[];

  constructor(signals: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM']) {
    this.signals = signals;
  }

  Subscribe(listener: () => void): () => void {
    const handler = () => listener();
    for (const signal of this.signals) {
      process.on(signal, handler);
    }
    return () => {
      for (const signal of this.signals) {
        process.off(signal, handler);
      }
    };
  }
}

/**
 * Combines several notifiers into one.
 */
export function MergeNotifiers(...notifiers: InterruptNotifier[]): InterruptNotifier {
  return {
    Subscribe(listener) {
      const unsubscribers = notifiers.map((notifier) => notifier.Subscribe(listener));
      return () => {
        for (const unsubscribe of unsubscribers) {
          unsubscribe();
        }
      };
    },
  };
}

/**
 * Cancellation scope of exactly one submission.
 */
export class CancellationBridge {
  private readonly controller = new AbortController();
  private readonly unsubscribe: () => void;
  private state: BridgeState = 'armed';

  constructor(notifier: InterruptNotifier) {
    this.unsubscribe = notifier.Subscribe(() => this.interrupt());
  }

  /**
   * Runs `submit` inside a fresh bridge and retires the bridge when the
   * submission settles.
   *
   * @example
   * ```typescript
   * const results = await CancellationBridge.Run(notifier, (signal) =>
   *   session.Submit(batch, signal)
   * );
   * ```
   */
  static async Run<T>(notifier: InterruptNotifier, submit: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const bridge = new CancellationBridge(notifier);
    try {
      return await submit(bridge.Signal);
    } finally {
      bridge.Retire();
    }
  }

  get Signal(): AbortSignal {
    return this.controller.signal;
  }

  get State(): BridgeState {
    return this.state;
  }

  /** True once an interrupt canceled the submission */
  get Canceled(): boolean {
    return this.controller.signal.aborted;
  }

  private interrupt(): void {
    if (this.state !== 'armed' || this.controller.signal.aborted) {
      return;
    }
    this.controller.abort();
  }

  /**
   * Detaches the listener. Call only after the submission has returned.
   */
  Retire(): void {
    if (this.state === 'retired') {
      return;
    }
    this.state = 'retired';
    this.unsubscribe();
  }
}
