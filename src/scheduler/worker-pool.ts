/**
 * Bounded async worker pool.
 *
 * At most `size` jobs run at once; the rest wait in FIFO order. There is no
 * queue limit. Probe tasks and retry re-probes share one pool, so `size`
 * bounds simultaneous outbound Docker/notify calls.
 */

type Job = () => Promise<void>;

export class WorkerPool {
  private running = 0;
  private queue: Job[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
  }

  /** Queue a job. The returned promise settles with the job's own result. */
  submit<T>(job: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await job());
        } catch (err) {
          reject(err);
        }
      });
      this.pump();
    });
  }

  /** Resolves once nothing is running or queued. */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }

  private pump(): void {
    while (this.running < this.size) {
      const next = this.queue.shift();
      if (!next) break;
      this.running++;
      void next().finally(() => {
        this.running--;
        this.pump();
        if (this.isIdle()) this.notifyIdle();
      });
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
