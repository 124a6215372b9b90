/**
 * Self-rescheduling background loops.
 *
 * @module
 */

export interface PeriodicHandle {
  /**
   * Clear the pending timer and abort the signal handed to `fn`. A run
   * already in progress is not awaited; it should check the signal.
   */
  cancel(): void;
  readonly cancelled: boolean;
}

/**
 * Run `fn` now, then again `intervalMs` after each run settles, until
 * cancelled. Runs never overlap. A rejected run is passed to `onError` and
 * the loop carries on. `fn` receives a signal that aborts on cancel.
 */
export function startPeriodic(
  fn: (signal: AbortSignal) => void | Promise<void>,
  intervalMs: number,
  onError: (error: unknown) => void,
): PeriodicHandle {
  let timer: ReturnType<typeof setTimeout> | null = null;
  const controller = new AbortController();

  const tick = async () => {
    timer = null;
    try {
      await fn(controller.signal);
    } catch (err) {
      onError(err);
    }
    if (!controller.signal.aborted) {
      timer = setTimeout(() => void tick(), intervalMs);
    }
  };

  void tick();

  return {
    cancel() {
      controller.abort();
      if (timer !== null) {
        clearTimeout(timer);
        timer = null;
      }
    },
    get cancelled() {
      return controller.signal.aborted;
    },
  };
}
