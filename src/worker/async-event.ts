/**
 * Broadcast signal for coordinating the worker loop and its observers.
 *
 * @module
 */

/**
 * A flag that coroutines can wait on. `set()` wakes every current waiter and
 * keeps the flag raised until `clear()`; waiting on a raised flag resolves
 * immediately.
 *
 * `pulse()` clears and re-sets the flag, which observers use as a
 * "something happened since I last cleared" notification.
 */
export class AsyncEvent {
  private flag = false;
  private waiters = new Set<() => void>();

  get isSet(): boolean {
    return this.flag;
  }

  set(): void {
    if (this.flag) return;
    this.flag = true;
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiters) {
      wake();
    }
  }

  clear(): void {
    this.flag = false;
  }

  pulse(): void {
    this.clear();
    this.set();
  }

  /**
   * Resolve once the flag is set. Aborting `signal` resolves the wait early
   * and drops the waiter.
   */
  wait(signal?: AbortSignal): Promise<void> {
    if (this.flag || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const onAbort = () => {
        this.waiters.delete(wake);
        resolve();
      };
      const wake = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.waiters.add(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Number of pending waiters. */
  get waiterCount(): number {
    return this.waiters.size;
  }
}

/**
 * Wait until any of the events is set, then cancel the remaining waits.
 */
export async function waitForAny(events: readonly AsyncEvent[]): Promise<void> {
  const controller = new AbortController();
  try {
    await Promise.race(events.map((event) => event.wait(controller.signal)));
  } finally {
    controller.abort();
  }
}
