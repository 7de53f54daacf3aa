import pLimit from 'p-limit';

export class WorkerPoolClosedError extends Error {
  constructor() {
    super('Worker pool is closed');
    this.name = 'WorkerPoolClosedError';
  }
}

/**
 * Fixed-size pool: at most `size` tasks run at once, the rest wait in FIFO
 * order for a free slot.
 */
export class WorkerPool {
  private limiter: ReturnType<typeof pLimit>;
  private closed = false;

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.limiter = pLimit(size);
  }

  get activeCount(): number {
    return this.limiter.activeCount;
  }

  get pendingCount(): number {
    return this.limiter.pendingCount;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new WorkerPoolClosedError());
    }
    return this.limiter(task);
  }

  /** Runs every task and resolves with their results in submission order. */
  runAll<T>(tasks: (() => Promise<T>)[]): Promise<T[]> {
    return Promise.all(tasks.map((task) => this.run(task)));
  }

  /** Drops queued tasks that have not started and refuses new ones. */
  close(): void {
    this.closed = true;
    this.limiter.clearQueue();
  }

  /** Creates a pool for the duration of `fn` and closes it on every exit path. */
  static async scoped<R>(size: number, fn: (pool: WorkerPool) => Promise<R>): Promise<R> {
    const pool = new WorkerPool(size);
    try {
      return await fn(pool);
    } finally {
      pool.close();
    }
  }
}
