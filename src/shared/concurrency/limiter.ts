/**
 * A tiny concurrency limiter (no external deps).
 * Usage:
 *   const limit = createLimiter(10);
 *   await Promise.all(items.map(i => limit(() => doWork(i))));
 */
export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const fn = queue.shift();
    if (!fn) return;
    active += 1;
    fn();
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    return new Promise<T>((resolve, reject) => {
      queue.push(async () => {
        try {
          const result = await task();
          resolve(result);
        } catch (err) {
          reject(err);
        } finally {
          active -= 1;
          next();
        }
      });
      next();
    });
  };
};

/**
 * Runs `fn` over `items` with at most `concurrency` in flight.
 * Slot i of the result always belongs to items[i], whichever task settles first.
 */
export const mapSettledInOrder = async <T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> => {
  const limit = createLimiter(Math.max(1, Math.min(items.length, concurrency)));
  return Promise.allSettled(items.map((item, index) => limit(() => fn(item, index))));
};
