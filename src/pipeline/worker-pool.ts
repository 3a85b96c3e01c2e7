import { RequestAbortedError, RequestTimeoutError, isTransientError } from '../errors/provider-errors';
import { debug } from '../output/logger';

export interface WorkerPoolOptions {
  concurrency: number;
  timeoutMs: number;
  /** Total attempts per task, first try included. */
  maxAttempts: number;
  isTransient?: (error: unknown) => boolean;
  /** Once aborted, no new task or retry starts; running attempts finish. */
  signal?: AbortSignal;
}

export interface WorkerPoolStats {
  started: number;
  retried: number;
  timedOut: number;
  failed: number;
  skipped: number;
}

export type PoolTask<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Bounded pool shared by every generation call of a run: limits concurrency,
 * enforces a per-attempt timeout and retries transient failures.
 */
export class WorkerPool {
  private active = 0;
  private readonly waiting: Array<() => void> = [];
  private readonly isTransient: (error: unknown) => boolean;
  readonly stats: WorkerPoolStats = { started: 0, retried: 0, timedOut: 0, failed: 0, skipped: 0 };

  constructor(private readonly options: WorkerPoolOptions) {
    if (options.concurrency < 1) throw new RangeError('WorkerPool concurrency must be >= 1');
    if (options.maxAttempts < 1) throw new RangeError('WorkerPool maxAttempts must be >= 1');
    this.isTransient = options.isTransient ?? isTransientError;
  }

  get aborted(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  async run<T>(task: PoolTask<T>, label: string = 'task'): Promise<T> {
    await this.acquire();
    try {
      let attempt = 0;
      while (true) {
        if (this.aborted) {
          this.stats.skipped++;
          throw new RequestAbortedError(`${label}: run aborted before the request was issued`);
        }
        attempt++;
        try {
          this.stats.started++;
          return await this.attempt(task);
        } catch (e: unknown) {
          if (e instanceof RequestTimeoutError) this.stats.timedOut++;
          if (attempt < this.options.maxAttempts && this.isTransient(e) && !this.aborted) {
            this.stats.retried++;
            debug(`${label}: attempt ${attempt} failed, retrying:`, e instanceof Error ? e.message : String(e));
            continue;
          }
          this.stats.failed++;
          throw e;
        }
      }
    } finally {
      this.release();
    }
  }

  private async attempt<T>(task: PoolTask<T>): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new RequestTimeoutError(this.options.timeoutMs);
        controller.abort(error);
        reject(error);
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([task(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.options.concurrency) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    this.waiting.shift()?.();
  }
}
