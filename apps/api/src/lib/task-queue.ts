type QueuedTask = {
  run: () => Promise<void>;
};

/**
 * Bounded pool of detached units of work. At most `concurrency` tasks run at
 * once; further submissions wait in FIFO order. Started tasks cannot be
 * cancelled.
 */
export class TaskQueue {
  private readonly concurrency: number;
  private readonly waiting: QueuedTask[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(concurrency = 2) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`TaskQueue concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.waiting.length;
  }

  /** Enqueue `task`; the returned promise settles with the task's own result. */
  submit<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.waiting.push({
        run: async () => {
          try {
            resolve(await task());
          } catch (err) {
            reject(err);
          }
        },
      });
      this.pump();
    });
  }

  /** Resolves once nothing is running or waiting. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.waiting.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    while (this.running < this.concurrency) {
      const next = this.waiting.shift();
      if (!next) break;
      this.running++;
      void next.run().finally(() => {
        this.running--;
        this.pump();
        this.notifyIdle();
      });
    }
  }

  private notifyIdle(): void {
    if (this.running > 0 || this.waiting.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
