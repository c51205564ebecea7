/**
 * Task Pool - fixed-size concurrency limit for async work
 *
 * - At most `maxConcurrency` tasks in flight
 * - Extra tasks wait in FIFO order and start as slots free up
 */

// ============================================
// Types
// ============================================

export type TaskPoolConfig = {
  /** Max concurrent tasks */
  maxConcurrency: number;
  /** Enable debug logging */
  debug?: boolean;
};

// Starts a waiting task and wires its result back to the caller's promise
type QueuedTask = () => void;

// ============================================
// Pool Implementation
// ============================================

export class TaskPool {
  private readonly maxConcurrency: number;
  private readonly debug: boolean;
  private inFlight = 0;
  private queue: QueuedTask[] = [];

  constructor(config: TaskPoolConfig) {
    if (!Number.isInteger(config.maxConcurrency) || config.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${config.maxConcurrency}`);
    }
    this.maxConcurrency = config.maxConcurrency;
    this.debug = config.debug ?? false;
  }

  /**
   * Run a task through the pool; resolves or rejects with the task itself
   */
  run<T>(execute: () => Promise<T>): Promise<T> {
    if (this.inFlight < this.maxConcurrency) {
      return this.runTask(execute);
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        this.runTask(execute).then(resolve, reject);
      });
      this.log(`Queued task (queue size: ${this.queue.length})`);
    });
  }

  getStats() {
    return {
      inFlight: this.inFlight,
      queued: this.queue.length,
      maxConcurrency: this.maxConcurrency,
    };
  }

  // ============================================
  // Private Methods
  // ============================================

  private async runTask<T>(execute: () => Promise<T>): Promise<T> {
    this.inFlight++;
    this.log(`Starting task (in-flight: ${this.inFlight})`);

    try {
      return await execute();
    } finally {
      this.inFlight--;
      this.log(`Completed task (in-flight: ${this.inFlight})`);
      this.processQueue();
    }
  }

  private processQueue() {
    if (this.inFlight >= this.maxConcurrency) return;
    this.queue.shift()?.();
  }

  private log(message: string) {
    if (this.debug) {
      console.log(`[POOL] ${message}`);
    }
  }
}
