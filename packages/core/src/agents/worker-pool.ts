/**
 * Worker Pool for bounded concurrency
 *
 * Caps how many documents (or LLM calls) run at once. Each submitted task takes one
 * worker; tasks beyond the limit wait in FIFO order until a worker frees up.
 *
 * Logging is minimal - only failures and slow tasks are logged.
 */

import {
  WORKER_POOL_CHECK_INTERVAL_MS,
  WORKER_POOL_DEFAULT_MAX_WORKERS,
  WORKER_POOL_MAX_ITERATIONS,
  WORKER_POOL_SLOW_TASK_MS,
} from '../constants';

export interface WorkerPoolStats {
  active: number;
  queued: number;
  max: number;
}

interface QueuedTask {
  run: () => Promise<void>;
  cancel: (reason: Error) => void;
}

export class WorkerPool {
  private readonly maxWorkers: number;
  private activeWorkers = 0;
  private queue: QueuedTask[] = [];
  private running = true;

  constructor(maxWorkers: number = WORKER_POOL_DEFAULT_MAX_WORKERS) {
    this.maxWorkers = Math.max(1, Math.floor(maxWorkers));
  }

  /**
   * Run a task through the pool, queueing it while all workers are busy.
   */
  execute<T>(task: () => Promise<T>): Promise<T> {
    if (!this.running) {
      return Promise.reject(new Error('Worker pool has been shut down'));
    }

    return new Promise<T>((resolve, reject) => {
      const wrappedTask = async (): Promise<void> => {
        const workerId = this.activeWorkers;
        const startTime = Date.now();
        try {
          const result = await task();
          const duration = Date.now() - startTime;
          if (duration > WORKER_POOL_SLOW_TASK_MS) {
            console.warn(`[WorkerPool] Worker ${workerId} completed slowly after ${duration}ms`);
          }
          resolve(result);
        } catch (error) {
          const duration = Date.now() - startTime;
          console.error(`[WorkerPool] Worker ${workerId} failed after ${duration}ms:`, error);
          reject(error);
        } finally {
          this.activeWorkers--;
          setImmediate(() => this.processQueue());
        }
      };

      if (this.activeWorkers < this.maxWorkers) {
        // Increment before starting so simultaneous submissions cannot exceed the limit
        this.activeWorkers++;
        void wrappedTask();
      } else {
        this.queue.push({ run: wrappedTask, cancel: reject });
      }
    });
  }

  /**
   * Start queued tasks while workers are free.
   */
  private processQueue(): void {
    while (this.queue.length > 0 && this.activeWorkers < this.maxWorkers && this.running) {
      const task = this.queue.shift();
      if (task) {
        this.activeWorkers++;
        void task.run();
      }
    }
  }

  getStats(): WorkerPoolStats {
    return {
      active: this.activeWorkers,
      queued: this.queue.length,
      max: this.maxWorkers,
    };
  }

  /**
   * Wait until no task is active or queued (bounded by WORKER_POOL_MAX_ITERATIONS polls).
   */
  async waitForCompletion(): Promise<void> {
    let iterations = 0;
    while ((this.activeWorkers > 0 || this.queue.length > 0) && iterations < WORKER_POOL_MAX_ITERATIONS) {
      await new Promise((resolve) => setTimeout(resolve, WORKER_POOL_CHECK_INTERVAL_MS));
      iterations++;
    }
    if (iterations >= WORKER_POOL_MAX_ITERATIONS) {
      console.warn(`[WorkerPool] waitForCompletion timeout: ${this.activeWorkers} active, ${this.queue.length} queued`);
    }
  }

  /**
   * Stop accepting tasks. Running tasks finish; queued tasks are rejected.
   */
  shutdown(): void {
    this.running = false;
    const pending = this.queue;
    this.queue = [];
    for (const task of pending) {
      task.cancel(new Error('Worker pool has been shut down'));
    }
  }
}
