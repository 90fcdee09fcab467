export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<boolean>;

// Longest delay setTimeout accepts; larger values fire after 1ms
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Wait for `ms` milliseconds.
 * Resolves true when the full delay elapsed, false as soon as `signal` aborts.
 * Delays beyond the timer limit are waited out in consecutive steps.
 */
export const sleep: Sleeper = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const schedule = (): void => {
      const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
      remaining -= step;
      timer = setTimeout(() => {
        if (remaining > 0) {
          schedule();
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve(true);
      }, step);
    };

    signal?.addEventListener('abort', onAbort, { once: true });
    schedule();
  });
