import { setTimeout as delay } from 'timers/promises';
import type { WatchHandle } from '../../filewatch/channel.js';

export interface SignalCounter {
  readonly count: number;
  /** Resolves with the final count once the handle closes */
  readonly finished: Promise<number>;
}

/**
 * Drain a handle in the background, counting signals.
 */
export function countSignals(handle: WatchHandle): SignalCounter {
  let count = 0;
  const finished = (async () => {
    while (!(await handle.receive()).done) {
      count++;
    }
    return count;
  })();

  return {
    get count() {
      return count;
    },
    finished
  };
}

export async function waitFor(predicate: () => boolean, timeoutMs = 5000, intervalMs = 10): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await delay(intervalMs);
  }
}

/**
 * Resolve with true if `promise` settles within `timeoutMs`, false otherwise.
 */
export async function settlesWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  const timeout = delay(timeoutMs).then(() => false);
  return Promise.race([promise.then(() => true), timeout]);
}
