export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} 超时（${ms}ms）`);
    this.name = 'TimeoutError';
  }
}

/**
 * Runs `task` with an abort signal that fires after `ms`; the returned promise
 * rejects with a `TimeoutError` at that point even if the task ignores the
 * signal.
 */
export async function withTimeout<T>(
  label: string,
  ms: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, ms));
    }, ms);
  });
  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Processes `items` with at most `size` workers in flight. Results are
 * returned in completion order, not input order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  size: number,
  worker: (item: T) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(size) || size < 1) {
    throw new TypeError('工作池大小必须是正整数');
  }
  const completed: R[] = [];
  let cursor = 0;
  const next = async (): Promise<void> => {
    while (cursor < items.length) {
      const item = items[cursor];
      cursor += 1;
      completed.push(await worker(item));
    }
  };
  const workers = Array.from({ length: Math.min(size, items.length) }, () => next());
  await Promise.all(workers);
  return completed;
}
