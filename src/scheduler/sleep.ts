import { MAX_TIMER_DELAY_MS } from '../config/schema.js';

/**
 * Clamp a requested delay to what a timer can honour. Negative, NaN and
 * infinite-negative values become 0; values above the timer limit are capped
 * so the caller simply wakes early and re-evaluates.
 */
export function clampDelay(ms: number): number {
  if (Number.isNaN(ms) || ms <= 0) return 0;
  return Math.min(ms, MAX_TIMER_DELAY_MS);
}

/**
 * Cancellable sleep. Resolves true when the full delay elapsed and false when
 * the signal aborted first; never rejects.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise(resolve => {
    if (signal.aborted) {
      resolve(false);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, clampDelay(ms));

    signal.addEventListener('abort', onAbort, { once: true });
  });
}
