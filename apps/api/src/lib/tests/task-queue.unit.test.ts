import { describe, expect, it, vi } from 'vitest';
import { TaskQueue } from '../task-queue.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('TaskQueue', () => {
  it('rejects a non-positive concurrency', () => {
    expect(() => new TaskQueue(0)).toThrow(/positive integer/);
  });

  it('runs at most `concurrency` tasks at once, in FIFO order', async () => {
    const queue = new TaskQueue(2);
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
    const started: number[] = [];

    const results = gates.map((gate, i) =>
      queue.submit(async () => {
        started.push(i);
        await gate.promise;
        return i;
      })
    );

    expect(started).toEqual([0, 1]);
    expect(queue.active).toBe(2);
    expect(queue.pending).toBe(1);

    gates[0]?.resolve();
    await expect(results[0]).resolves.toBe(0);
    await vi.waitFor(() => expect(started).toEqual([0, 1, 2]));

    gates[1]?.resolve();
    gates[2]?.resolve();
    await expect(Promise.all(results)).resolves.toEqual([0, 1, 2]);
    await queue.onIdle();
    expect(queue.active).toBe(0);
  });

  it('propagates task failures to the submitter and keeps draining', async () => {
    const queue = new TaskQueue(1);
    const failed = queue.submit(async () => {
      throw new Error('boom');
    });
    const next = queue.submit(async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('onIdle resolves immediately on an empty queue', async () => {
    await expect(new TaskQueue().onIdle()).resolves.toBeUndefined();
  });
});
