/**
 * Bounded worker pool with cooperative cancellation.
 *
 * Once `signal` aborts no new item starts. Items already running get
 * `gracePeriodMs` to settle; after that the pool returns and anything
 * still running is reported as cancelled. Workers receive a signal that
 * fires when they are abandoned.
 */

export type PoolOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; error: unknown }
  | { status: 'cancelled' };

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
  gracePeriodMs: number;
}

export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  opts: PoolOptions,
): Promise<PoolOutcome<R>[]> {
  const outcomes = items.map((): PoolOutcome<R> => ({ status: 'cancelled' }));
  const abandon = new AbortController();
  let next = 0;

  const runWorker = async (): Promise<void> => {
    while (next < items.length && !opts.signal?.aborted) {
      const index = next++;
      try {
        const value = await worker(items[index], index, abandon.signal);
        if (!abandon.signal.aborted) outcomes[index] = { status: 'fulfilled', value };
      } catch (error) {
        if (!abandon.signal.aborted) outcomes[index] = { status: 'rejected', error };
      }
    }
  };

  const workerCount = Math.max(1, Math.min(opts.concurrency, items.length));
  const finished = Promise.all(Array.from({ length: workerCount }, runWorker)).then(() => 'finished' as const);

  const grace = graceAfterAbort(opts.signal, opts.gracePeriodMs);
  try {
    const winner = await Promise.race([finished, grace.expired]);
    if (winner === 'expired') {
      abandon.abort();
    }
  } finally {
    grace.cancel();
  }

  return outcomes;
}

/** Resolves 'expired' once `signal` has been aborted for `graceMs` */
function graceAfterAbort(
  signal: AbortSignal | undefined,
  graceMs: number,
): { expired: Promise<'expired'>; cancel: () => void } {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const expired = new Promise<'expired'>((resolve) => {
    if (!signal) return;
    const start = (): void => {
      timer = setTimeout(() => resolve('expired'), graceMs);
    };
    if (signal.aborted) {
      start();
    } else {
      onAbort = start;
      signal.addEventListener('abort', start, { once: true });
    }
  });

  return {
    expired,
    cancel: () => {
      clearTimeout(timer);
      if (onAbort) signal?.removeEventListener('abort', onAbort);
    },
  };
}
