/**
 * Shared async and error-rendering helpers.
 * @module
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Render a thrown value as a multi-line trace for storing in a task result.
 * Errors carry their stack; anything else is stringified.
 */
export function formatTraceback(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return `Thrown value: ${String(error)}`;
}

/**
 * Monotonic clock in milliseconds, used for job timing.
 */
export function monotonicNow(): number {
  return performance.now();
}
