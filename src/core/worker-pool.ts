/**
 * Bounded concurrency for independent jobs.
 *
 * At most `size` jobs run at once; the rest wait in FIFO order. A job that
 * rejects does not stop the pool, its rejection is returned to the caller of
 * `run()` for that job only.
 */
export class WorkerPool {
  private readonly size: number;
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  get running(): number {
    return this.active;
  }

  async run<T>(job: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await job();
    } finally {
      this.release();
    }
  }

  /** Runs every job through the pool; resolves once all have settled. */
  async runAll<T>(jobs: Array<() => Promise<T>>): Promise<PromiseSettledResult<T>[]> {
    return Promise.allSettled(jobs.map((job) => this.run(job)));
  }

  private acquire(): Promise<void> {
    if (this.active < this.size) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.waiting.shift();
    if (next) next();
  }
}
