import { createLogger } from "@stacksmith/shared";

interface Job {
  label: string;
  task: () => Promise<void>;
}

/**
 * Bounded-concurrency runner. Jobs beyond `maxConcurrency` wait in FIFO order;
 * `cancelPending` drops every job that has not started.
 */
export class WorkerPool {
  private logger = createLogger("worker-pool");
  private activeCount = 0;
  private queue: Job[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new Error(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }
  }

  submit(label: string, task: () => Promise<void>): void {
    const job = { label, task };
    if (this.activeCount < this.maxConcurrency) {
      this.start(job);
    } else {
      this.queue.push(job);
      this.logger.debug(`Queued ${label} (queue size: ${this.queue.length})`);
    }
  }

  /**
   * Remove queued jobs and return their labels. Running jobs are unaffected.
   */
  cancelPending(): string[] {
    const labels = this.queue.map((job) => job.label);
    this.queue = [];
    this.notifyIfIdle();
    return labels;
  }

  onIdle(): Promise<void> {
    if (this.activeCount === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private start(job: Job): void {
    this.activeCount++;
    void job
      .task()
      .catch((err: unknown) => {
        this.logger.error(`Job ${job.label} threw`, err);
      })
      .finally(() => {
        this.activeCount--;
        this.processQueue();
        this.notifyIfIdle();
      });
  }

  private processQueue(): void {
    while (this.queue.length > 0 && this.activeCount < this.maxConcurrency) {
      const next = this.queue.shift();
      if (next) this.start(next);
    }
  }

  private notifyIfIdle(): void {
    if (this.activeCount > 0 || this.queue.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  get stats() {
    return {
      active: this.activeCount,
      queued: this.queue.length,
      max: this.maxConcurrency,
    };
  }
}
