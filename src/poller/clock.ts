/**
 * Time source for the poller.
 * @module poller/clock
 */

/**
 * Reads the time and waits. Injected so waits can run on virtual time.
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  /** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Longest delay a single Node timer honours; longer ones fire after 1 ms. */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Clock backed by Date.now and timers. Waits longer than one timer allows
 * are split across consecutive timers.
 */
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }

      let remaining = Math.max(0, ms);
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const finish = (): void => {
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', finish);
        resolve();
      };

      const schedule = (): void => {
        const delay = Math.min(remaining, MAX_TIMER_DELAY_MS);
        remaining -= delay;
        timeoutId = setTimeout(remaining > 0 ? schedule : finish, delay);
      };

      signal?.addEventListener('abort', finish, { once: true });
      schedule();
    });
  }
}
