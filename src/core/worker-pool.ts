import { TimeoutError } from './errors.js';

/**
 * Settled result of one pooled task.
 */
export type TaskResult<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown };

export interface WorkerPoolConfig {
  /** Maximum tasks in flight */
  concurrency: number;
  /** Per-task time budget in ms */
  taskTimeoutMs: number;
}

const DEFAULT_CONFIG: WorkerPoolConfig = {
  concurrency: 4,
  taskTimeoutMs: 2_000,
};

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Bounded pool for running independent tasks concurrently.
 *
 * Results come back in input order. A task that throws or exceeds the
 * timeout yields a rejected result; it never rejects the whole batch.
 * Synchronous work cannot be interrupted by the timer, so a task whose
 * elapsed time ran over the budget is also rejected with TimeoutError.
 */
export class WorkerPool {
  private readonly config: WorkerPoolConfig;

  constructor(config: Partial<WorkerPoolConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.concurrency < 1) {
      this.config.concurrency = 1;
    }
  }

  async map<T, R>(items: readonly T[], task: (item: T) => R | Promise<R>): Promise<TaskResult<R>[]> {
    const results: TaskResult<R>[] = new Array<TaskResult<R>>(items.length);
    const queue = items.map((item, index) => ({ item, index }));

    const worker = async (): Promise<void> => {
      let job = queue.shift();
      while (job) {
        const { item, index } = job;
        const startedAt = Date.now();
        try {
          // Promise.resolve().then turns a synchronous throw into a rejection
          const value = await withTimeout(
            Promise.resolve().then(() => task(item)),
            this.config.taskTimeoutMs
          );
          results[index] =
            Date.now() - startedAt > this.config.taskTimeoutMs
              ? { status: 'rejected', reason: new TimeoutError(this.config.taskTimeoutMs) }
              : { status: 'fulfilled', value };
        } catch (reason) {
          results[index] = { status: 'rejected', reason };
        }
        job = queue.shift();
      }
    };

    const workerCount = Math.min(this.config.concurrency, items.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return results;
  }
}

/**
 * Factory function for creating a worker pool.
 */
export function createWorkerPool(config: Partial<WorkerPoolConfig> = {}): WorkerPool {
  return new WorkerPool(config);
}
