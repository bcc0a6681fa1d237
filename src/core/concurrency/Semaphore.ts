import { CancelledError, TimeoutError, ValidationError } from '../errors';

interface Waiter {
  grant: () => void;
}

export class Semaphore {
  private permits: number;
  private waitQueue: Waiter[] = [];
  private lastUsedAt = Date.now();

  constructor(private readonly maxPermits: number) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new ValidationError(`Semaphore needs at least one permit, got ${maxPermits}`, 'maxPermits');
    }
    this.permits = maxPermits;
  }

  async acquire(timeoutMs?: number, signal?: AbortSignal): Promise<void> {
    this.lastUsedAt = Date.now();
    if (signal?.aborted) {
      throw new CancelledError('Cancelled while waiting for a permit');
    }
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const detach = (): void => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const dequeue = (): void => {
        const index = this.waitQueue.indexOf(waiter);
        if (index >= 0) this.waitQueue.splice(index, 1);
        detach();
      };
      const onAbort = (): void => {
        dequeue();
        reject(new CancelledError('Cancelled while waiting for a permit'));
      };
      const waiter: Waiter = {
        grant: () => {
          detach();
          resolve();
        },
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          dequeue();
          reject(new TimeoutError(`Timed out after ${timeoutMs}ms waiting for a permit`, timeoutMs));
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waitQueue.push(waiter);
    });
  }

  release(): void {
    this.lastUsedAt = Date.now();
    const next = this.waitQueue.shift();
    if (next) {
      next.grant();
    } else if (this.permits < this.maxPermits) {
      this.permits++;
    }
  }

  getAvailablePermits(): number {
    return this.permits;
  }

  getWaitingCount(): number {
    return this.waitQueue.length;
  }

  isIdleSince(cutoff: number): boolean {
    return this.permits === this.maxPermits && this.waitQueue.length === 0 && this.lastUsedAt < cutoff;
  }
}

/** One semaphore per key, created on first use. */
export class SemaphorePool {
  private semaphores: Map<string, Semaphore> = new Map();

  constructor(private readonly defaultPermits: number) {}

  get(key: string, permits?: number): Semaphore {
    let semaphore = this.semaphores.get(key);
    if (!semaphore) {
      semaphore = new Semaphore(permits ?? this.defaultPermits);
      this.semaphores.set(key, semaphore);
    }
    return semaphore;
  }

  cleanupIdle(idleMs: number, now: number = Date.now()): number {
    const cutoff = now - idleMs;
    let removed = 0;
    for (const [key, semaphore] of this.semaphores.entries()) {
      if (semaphore.isIdleSince(cutoff)) {
        this.semaphores.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.semaphores.size;
  }
}

/** Serializes async work per key; different keys run concurrently. */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  size(): number {
    return this.tails.size;
  }
}

/** Maps `items` through `worker` with at most `limit` in flight; output keeps input order. */
export async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const semaphore = new Semaphore(Math.max(1, Math.floor(limit)));
  return Promise.all(
    items.map(async (item, index) => {
      await semaphore.acquire();
      try {
        return await worker(item, index);
      } finally {
        semaphore.release();
      }
    }),
  );
}
