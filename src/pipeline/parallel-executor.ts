/**
 * Parallel Executor
 *
 * Runs step tasks concurrently under an optional concurrency bound.
 */

/**
 * Counting semaphore
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = permits;
  }

  public async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  public release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    this.permits++;
  }

  public getAvailablePermits(): number {
    return this.permits;
  }

  public getWaitingCount(): number {
    return this.waiting.length;
  }
}

export class ParallelExecutor {
  private semaphore: Semaphore;

  /**
   * @param maxConcurrent Infinity for no bound
   */
  constructor(maxConcurrent: number = Infinity) {
    if (!(maxConcurrent >= 1)) {
      throw new RangeError(`maxConcurrent must be at least 1 (got ${maxConcurrent})`);
    }
    this.semaphore = new Semaphore(maxConcurrent);
  }

  /**
   * Run every task; results come back in task order, not completion order
   */
  public async executeParallel<T>(tasks: Array<() => Promise<T>>): Promise<T[]> {
    return Promise.all(tasks.map((task) => this.executeWithSemaphore(task)));
  }

  private async executeWithSemaphore<T>(task: () => Promise<T>): Promise<T> {
    await this.semaphore.acquire();
    try {
      return await task();
    } finally {
      this.semaphore.release();
    }
  }
}
