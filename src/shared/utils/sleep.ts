import { CancelledError } from '../errors/AppError';

/**
 * Suspends the calling task for `ms` milliseconds. Rejects with
 * CancelledError as soon as `signal` aborts.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

/**
 * Uniform draw on [min, max) from the given source of randomness
 */
export function uniform(min: number, max: number, random: () => number = Math.random): number {
  return min + (max - min) * random();
}
