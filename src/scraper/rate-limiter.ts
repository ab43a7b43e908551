/**
 * Request pacing for detail fetches.
 *
 * Sequential runs pause the full delay between one record finishing and the
 * next one starting. Worker pools share one limiter that spaces request starts
 * by the delay.
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface RateLimiter {
  /** Resolves when the caller may start its next request. */
  acquire(): Promise<void>;
}

/**
 * Waits the whole delay before every acquisition but the first. Callers must
 * acquire only once the previous record is done.
 */
export function createSequentialPacer(delayMs: number, wait: Sleep = sleep): RateLimiter {
  let first = true;

  return {
    acquire: async () => {
      if (first) {
        first = false;
        return;
      }
      if (delayMs > 0) {
        await wait(delayMs);
      }
    }
  };
}

export function createRateLimiter(
  delayMs: number,
  wait: Sleep = sleep,
  now: () => number = Date.now
): RateLimiter {
  let nextSlot = 0;

  return {
    acquire: async () => {
      if (delayMs <= 0) return;
      const current = now();
      const slot = Math.max(current, nextSlot);
      nextSlot = slot + delayMs;
      if (slot > current) {
        await wait(slot - current);
      }
    }
  };
}
