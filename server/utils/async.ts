export type SleepFn = (ms: number, signal?: AbortSignal | null) => Promise<void>;

export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Draws a delay uniformly from `[minMs, maxMs]`. `random` must return a value in `[0, 1)`.
 */
export const uniformDelayMs = (minMs: number, maxMs: number, random: () => number = Math.random): number => {
  const low = Math.min(minMs, maxMs);
  const high = Math.max(minMs, maxMs);
  return Math.round(low + (high - low) * random());
};
