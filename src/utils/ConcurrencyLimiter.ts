export class AcquireAbortedError extends Error {
  constructor(message = 'Permit acquisition was aborted') {
    super(message);
    this.name = 'AcquireAbortedError';
  }
}

/**
 * A held slot in the pool; releasing twice is a no-op
 */
export interface Permit {
  release(): void;
}

interface Waiter {
  grant: (permit: Permit) => void;
}

/**
 * Counting semaphore shared by all job loops of one scheduler.
 *
 *   const limiter = new ConcurrencyLimiter(2);
 *   const permit = await limiter.acquire();
 *   try { await work(); } finally { permit.release(); }
 *
 * Waiters are served in FIFO order and may wait indefinitely.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly queue: Waiter[] = [];

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('concurrency must be an integer >= 1');
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) {
      return Promise.reject(new AcquireAbortedError());
    }

    if (this.active < this.capacity && this.queue.length === 0) {
      this.active += 1;
      return Promise.resolve(this.createPermit());
    }

    return new Promise<Permit>((resolve, reject) => {
      const waiter: Waiter = {
        grant: permit => {
          signal?.removeEventListener('abort', onAbort);
          resolve(permit);
        },
      };

      const onAbort = () => {
        const index = this.queue.indexOf(waiter);
        if (index !== -1) {
          this.queue.splice(index, 1);
        }
        reject(new AcquireAbortedError());
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  /**
   * Run a task while holding a permit
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(signal);
    try {
      return await task();
    } finally {
      permit.release();
    }
  }

  private createPermit(): Permit {
    let released = false;
    return {
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.active -= 1;
        this.next();
      },
    };
  }

  private next(): void {
    if (this.active >= this.capacity) return;
    const waiter = this.queue.shift();
    if (!waiter) return;
    this.active += 1;
    waiter.grant(this.createPermit());
  }
}
