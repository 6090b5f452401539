export interface TokenBucket {
  take(): boolean;
  /** Wait for a token; rejects with the signal's reason if aborted first. */
  acquire(signal?: AbortSignal): Promise<void>;
}

export function makeTokenBucket(
  capacity: number,
  refillPerSecond: number,
  now: () => number = Date.now,
): TokenBucket {
  let tokens = capacity;
  let last = now();

  const refill = () => {
    const current = now();
    const elapsed = (current - last) / 1000;
    last = current;
    tokens = Math.min(capacity, tokens + elapsed * refillPerSecond);
  };

  const take = (): boolean => {
    refill();
    if (tokens >= 1) {
      tokens -= 1;
      return true;
    }
    return false;
  };

  const acquire = async (signal?: AbortSignal): Promise<void> => {
    while (!take()) {
      signal?.throwIfAborted();
      const waitMs = Math.max(1, Math.ceil(((1 - tokens) / refillPerSecond) * 1000));
      await sleep(waitMs, signal);
    }
  };

  return { take, acquire };
}

export type ConcurrencyGate = <T>(task: () => Promise<T>) => Promise<T>;

export function makeConcurrencyGate(limit: number): ConcurrencyGate {
  let active = 0;
  const waiting: Array<() => void> = [];

  // Released slots pass straight to the next waiter; active only drops when none wait
  const release = () => {
    const next = waiting.shift();
    if (next) {
      next();
    } else {
      active -= 1;
    }
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    if (active >= limit) {
      await new Promise<void>((resolve) => waiting.push(resolve));
    } else {
      active += 1;
    }
    try {
      return await task();
    } finally {
      release();
    }
  };
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
