import { describe, it, expect } from 'vitest';
import { withDeadline } from '../../src/application/deadline.js';
import { SessionLock } from '../../src/application/session-lock.js';
import { StageTimeoutError } from '../../src/domain/index.js';

const tick = (ms = 0) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('SessionLock', () => {
  it('runs holders of the same key one at a time, in order', async () => {
    const lock = new SessionLock();
    const order: string[] = [];

    const job = (name: string, delay: number) => lock.runExclusive('s1', async () => {
      order.push(`${name}:start`);
      await tick(delay);
      order.push(`${name}:end`);
    });

    await Promise.all([job('a', 20), job('b', 0), job('c', 5)]);

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('does not serialize different keys', async () => {
    const lock = new SessionLock();
    const order: string[] = [];

    await Promise.all([
      lock.runExclusive('s1', async () => {
        await tick(20);
        order.push('s1');
      }),
      lock.runExclusive('s2', async () => {
        order.push('s2');
      }),
    ]);

    expect(order).toEqual(['s2', 's1']);
  });

  it('releases the key when the holder throws', async () => {
    const lock = new SessionLock();
    await expect(lock.runExclusive('s1', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.runExclusive('s1', async () => 'next')).resolves.toBe('next');
    expect(lock.busyKeys).toBe(0);
  });

  it('ignores a second release', async () => {
    const lock = new SessionLock();
    const release = await lock.acquire('s1');
    release();
    release();
    expect(lock.busyKeys).toBe(0);
  });
});

describe('withDeadline', () => {
  it('returns the result of work that finishes in time', async () => {
    await expect(withDeadline('STAGE', 50, async () => 'done')).resolves.toBe('done');
  });

  it('rejects with StageTimeoutError and aborts the signal', async () => {
    let seen: AbortSignal | undefined;
    const pending = withDeadline('RESPONSE_GENERATED', 10, (signal) => {
      seen = signal;
      return new Promise<string>(() => undefined);
    });

    await expect(pending).rejects.toThrow(StageTimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it('propagates errors from the work', async () => {
    await expect(withDeadline('STAGE', 50, async () => {
      throw new Error('inner');
    })).rejects.toThrow('inner');
  });
});
