/**
 * pLimit
 *
 * Caps how many async tasks run at once; extra tasks wait in FIFO order.
 *
 * @param concurrency - Max number of tasks in flight (a positive integer or Infinity)
 * @returns A scheduler that runs a thunk once a slot is free
 */
export function pLimit(concurrency: number) {
  if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
    throw new TypeError('Expected `concurrency` to be a number from 1 and up');
  }

  const waiting: Array<() => void> = [];
  let active = 0;

  const release = () => {
    active--;
    waiting.shift()?.();
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    const start = async () => {
      active++;
      try {
        return await task();
      } finally {
        release();
      }
    };

    if (active < concurrency) {
      return start();
    }
    return new Promise<T>((resolve, reject) => {
      waiting.push(() => {
        start().then(resolve, reject);
      });
    });
  };
}

/**
 * Map items through an async function with at most `limit` in flight.
 * Results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const schedule = pLimit(limit);
  return Promise.all(items.map((item, index) => schedule(() => fn(item, index))));
}
