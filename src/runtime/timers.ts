/**
 * Timer indirection used by the router and the planner client. Lookups happen
 * on {@link globalThis} at call time so Sinon fake timers installed by tests
 * take over the scheduling of timeouts and backoff delays.
 */
export type TimeoutHandle = ReturnType<typeof globalThis.setTimeout>;

export function runtimeSetTimeout(callback: () => void, delayMs: number): TimeoutHandle {
  return globalThis.setTimeout(callback, delayMs);
}

export function runtimeClearTimeout(handle: TimeoutHandle): void {
  globalThis.clearTimeout(handle);
}

/**
 * Resolves after {@link delayMs}. When {@link signal} aborts first the promise
 * rejects with the signal's reason and the timer is cleared.
 */
export function sleep(delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      runtimeClearTimeout(handle);
      reject(signal?.reason);
    };
    const handle = runtimeSetTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, delayMs));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
