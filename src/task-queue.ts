import { silentLogger, type Logger } from './logger.js';

/**
 * Single-worker queue bound to one working tree.
 * Every trigger (CLI, watcher, webhook) goes through it, so at most one task
 * touches the checkout at a time; jobs run in submission order.
 */
export class TaskQueue {
  private activeCount: number = 0;
  private waiting: Array<() => void> = [];

  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Wait for the worker to become free.
   * Returns a release function to call when done.
   */
  async acquire(): Promise<() => void> {
    if (this.activeCount >= 1) {
      // The releasing job hands its slot straight to the oldest waiter
      await new Promise<void>((resolve) => {
        this.waiting.push(() => resolve());
      });
    } else {
      this.activeCount++;
    }

    return () => {
      const waiter = this.waiting.shift();
      if (waiter) {
        waiter();
      } else {
        this.activeCount--;
      }
    };
  }

  /**
   * Run a job once every earlier job has finished
   */
  async enqueue<T>(label: string, job: () => Promise<T>): Promise<T> {
    if (this.activeCount > 0) {
      this.logger.info(`⏳ Queued ${label} (${this.waiting.length + 1} waiting)`);
    }

    const release = await this.acquire();
    try {
      return await job();
    } finally {
      release();
    }
  }

  /**
   * Jobs submitted but not started yet
   */
  pending(): number {
    return this.waiting.length;
  }

  active(): number {
    return this.activeCount;
  }
}
