import type { BackoffConfig } from './config.js';
import type { Clock } from './types.js';

/**
 * Delay before retry number `failures` (1-based).
 */
export function backoffDelay(config: BackoffConfig, failures: number): number {
  if (failures <= 0) return 0;
  if (config.strategy === 'fixed') {
    return Math.min(config.initialDelayMs, config.maxDelayMs);
  }
  const delay = config.initialDelayMs * Math.pow(config.multiplier, failures - 1);
  return Math.min(delay, config.maxDelayMs);
}

/**
 * Wall clock. `sleep` resolves early when the signal aborts; callers check
 * the signal themselves afterwards.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (ms <= 0 || signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    })
};
