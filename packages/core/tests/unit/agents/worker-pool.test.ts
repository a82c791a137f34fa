import { describe, expect, it } from 'vitest';
import { WorkerPool } from '../../../src';
import { deferred } from '../../fakes';

describe('WorkerPool', () => {
  it('never runs more tasks than it has workers', async () => {
    const pool = new WorkerPool(2);
    let active = 0;
    let peak = 0;

    const tasks = Array.from({ length: 5 }, (_, index) =>
      pool.execute(async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return index;
      })
    );

    expect(await Promise.all(tasks)).toEqual([0, 1, 2, 3, 4]);
    expect(peak).toBe(2);
  });

  it('starts queued tasks in submission order', async () => {
    const pool = new WorkerPool(1);
    const started: number[] = [];
    const gate = deferred<void>();

    const first = pool.execute(async () => {
      started.push(0);
      await gate.promise;
    });
    const rest = [1, 2, 3].map((n) =>
      pool.execute(async () => {
        started.push(n);
      })
    );

    expect(pool.getStats()).toEqual({ active: 1, queued: 3, max: 1 });
    gate.resolve();
    await Promise.all([first, ...rest]);
    expect(started).toEqual([0, 1, 2, 3]);
  });

  it('propagates task errors', async () => {
    const pool = new WorkerPool(1);
    await expect(pool.execute(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await pool.execute(async () => 'after')).toBe('after');
  });

  it('rejects queued and new tasks after shutdown', async () => {
    const pool = new WorkerPool(1);
    const gate = deferred<string>();
    const running = pool.execute(() => gate.promise);
    const queued = pool.execute(async () => 'never');

    pool.shutdown();
    await expect(queued).rejects.toThrow('Worker pool has been shut down');
    await expect(pool.execute(async () => 'late')).rejects.toThrow('Worker pool has been shut down');

    gate.resolve('done');
    expect(await running).toBe('done');
  });

  it('waits for completion', async () => {
    const pool = new WorkerPool(1);
    let finished = false;
    void pool.execute(async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      finished = true;
    });
    await pool.waitForCompletion();
    expect(finished).toBe(true);
    expect(pool.getStats().active).toBe(0);
  });
});
