/**
 * Interruptible delay.
 *
 * Resolves `true` once `ms` has elapsed, or `false` as soon as `signal`
 * aborts. Never rejects.
 */

/** Longest delay a single Node timer honours; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise<boolean>((resolve) => {
    let remaining = Math.max(0, ms);
    let timer: NodeJS.Timeout | undefined;

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    // Waits past the timer limit are chained in chunks
    const schedule = (): void => {
      const chunk = Math.min(remaining, MAX_TIMER_MS);
      remaining -= chunk;
      timer = setTimeout(() => {
        if (remaining > 0) return schedule();
        signal?.removeEventListener('abort', onAbort);
        resolve(true);
      }, chunk);
    };

    signal?.addEventListener('abort', onAbort, { once: true });
    schedule();
  });
}
