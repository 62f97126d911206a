export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class AbortedError extends Error {
  constructor(label: string) {
    super(`${label} was aborted`);
    this.name = 'AbortedError';
  }
}

/**
 * Resolves after `ms`, or early (without rejecting) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Races `task` against a timer and an optional abort signal.
 * The task receives a signal of its own that fires on either.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T> | T,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new AbortedError(label);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        controller.abort();
        reject(new AbortedError(label));
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([Promise.resolve().then(() => task(controller.signal)), guard]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort);
    }
  }
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight.
 * Results keep input order; each entry is settled independently.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const run = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index]) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => run()));
  return results;
}
