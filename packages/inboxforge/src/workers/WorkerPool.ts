import { errorMessage } from '../errors.js';
import { getLogger } from '../monitoring/logger.js';

const logger = getLogger({ service: 'WorkerPool' });

export interface WorkerPoolStats {
  active: number;
  queued: number;
  concurrency: number;
}

interface QueuedTask {
  label: string;
  run: () => Promise<void>;
}

/**
 * Bounded in-process worker pool. Runs at most `concurrency` tasks at a
 * time and queues the rest in submission order. Task failures are logged
 * here; callers never see an unhandled rejection.
 */
export class WorkerPool {
  private readonly concurrency: number;
  private activeTasks = 0;
  private queue: QueuedTask[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker concurrency must be a positive integer (got ${concurrency})`);
    }
    this.concurrency = concurrency;
  }

  /** Schedule a task; returns immediately. */
  submit(label: string, run: () => Promise<void>): void {
    this.queue.push({ label, run });
    logger.debug('Task queued', { label, ...this.stats() });
    this.pump();
  }

  stats(): WorkerPoolStats {
    return {
      active: this.activeTasks,
      queued: this.queue.length,
      concurrency: this.concurrency,
    };
  }

  /** Resolve once no task is running or queued. */
  drain(): Promise<void> {
    if (this.activeTasks === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    while (this.activeTasks < this.concurrency && this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) break;
      this.activeTasks++;
      void this.execute(task);
    }

    if (this.activeTasks === 0 && this.queue.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async execute(task: QueuedTask): Promise<void> {
    const start = Date.now();
    try {
      await task.run();
      logger.debug('Task finished', { label: task.label, durationMs: Date.now() - start });
    } catch (err) {
      logger.error('Task failed', { label: task.label, error: errorMessage(err) });
    } finally {
      this.activeTasks--;
      this.pump();
    }
  }
}
