import { AcquireAbortedError, ConcurrencyLimiter } from '../src/utils/ConcurrencyLimiter';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ConcurrencyLimiter', () => {
  it('should reject a capacity below one', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow('concurrency must be an integer >= 1');
    expect(() => new ConcurrencyLimiter(1.5)).toThrow('concurrency must be an integer >= 1');
  });

  it('should grant permits up to capacity and queue the rest', async () => {
    const limiter = new ConcurrencyLimiter(2);

    const first = await limiter.acquire();
    await limiter.acquire();
    let thirdGranted = false;
    const third = limiter.acquire().then(permit => {
      thirdGranted = true;
      return permit;
    });

    await Promise.resolve();
    expect(limiter.activeCount).toBe(2);
    expect(limiter.pendingCount).toBe(1);
    expect(thirdGranted).toBe(false);

    first.release();
    await third;

    expect(thirdGranted).toBe(true);
    expect(limiter.activeCount).toBe(2);
    expect(limiter.pendingCount).toBe(0);
  });

  it('should treat a second release of the same permit as a no-op', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const permit = await limiter.acquire();

    permit.release();
    permit.release();

    expect(limiter.activeCount).toBe(0);
  });

  it('should serve waiters in FIFO order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: string[] = [];
    const held = await limiter.acquire();

    const a = limiter.acquire().then(permit => {
      order.push('a');
      permit.release();
    });
    const b = limiter.acquire().then(permit => {
      order.push('b');
      permit.release();
    });

    held.release();
    await Promise.all([a, b]);

    expect(order).toEqual(['a', 'b']);
  });

  it('should remove an aborted waiter from the queue', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const held = await limiter.acquire();
    const controller = new AbortController();

    const waiting = limiter.acquire(controller.signal);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(AcquireAbortedError);
    expect(limiter.pendingCount).toBe(0);

    held.release();
    expect(limiter.activeCount).toBe(0);
  });

  it('should reject immediately when the signal is already aborted', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toThrow('Permit acquisition was aborted');
    expect(limiter.activeCount).toBe(0);
  });

  it('should never run more tasks than its capacity', async () => {
    const limiter = new ConcurrencyLimiter(3);
    let running = 0;
    let peak = 0;
    const gates = Array.from({ length: 8 }, () => deferred());

    const tasks = gates.map(gate =>
      limiter.run(async () => {
        running += 1;
        peak = Math.max(peak, running);
        await gate.promise;
        running -= 1;
      })
    );

    for (const gate of gates) {
      await new Promise(resolve => setImmediate(resolve));
      gate.resolve();
    }
    await Promise.all(tasks);

    expect(peak).toBe(3);
    expect(limiter.activeCount).toBe(0);
  });

  it('should release the permit when a task throws', async () => {
    const limiter = new ConcurrencyLimiter(1);

    await expect(limiter.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

    expect(limiter.activeCount).toBe(0);
  });
});
