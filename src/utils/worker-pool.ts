/**
 * Bounded Task Pool
 *
 * Runs async units of work with at most `concurrency` in flight. Each task
 * settles on its own: a rejection is recorded against that task and never
 * stops the rest of the queue.
 */

export interface PoolTask<R> {
  id: string;
  run: () => Promise<R>;
}

export interface TaskResult<R> {
  id: string;
  success: boolean;
  result?: R;
  error?: Error;
  durationMs: number;
}

export interface PoolStats {
  queuedTasks: number;
  activeTasks: number;
  completedTasks: number;
  erroredTasks: number;
}

export interface WorkerPoolConfig {
  /** Maximum tasks running at once (default: 5) */
  concurrency?: number;
}

const DEFAULT_CONFIG: Required<WorkerPoolConfig> = {
  concurrency: 5
};

interface QueuedTask {
  start: () => void;
}

export class WorkerPool {
  private readonly config: Required<WorkerPoolConfig>;
  private readonly queue: QueuedTask[] = [];
  private active = 0;
  private completed = 0;
  private errored = 0;

  constructor(config: WorkerPoolConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(this.config.concurrency) || this.config.concurrency < 1) {
      throw new RangeError('concurrency must be a positive integer');
    }
  }

  /**
   * Submit one task. The returned promise always resolves.
   */
  submit<R>(task: PoolTask<R>): Promise<TaskResult<R>> {
    return new Promise(resolve => {
      const start = (): void => {
        this.active++;
        const startedAt = Date.now();
        void Promise.resolve().then(() => task.run()).then(
          result => {
            this.completed++;
            resolve({ id: task.id, success: true, result, durationMs: Date.now() - startedAt });
          },
          (error: unknown) => {
            this.errored++;
            resolve({
              id: task.id,
              success: false,
              error: error instanceof Error ? error : new Error(String(error)),
              durationMs: Date.now() - startedAt
            });
          }
        ).finally(() => {
          this.active--;
          this.next();
        });
      };

      this.queue.push({ start });
      this.next();
    });
  }

  /**
   * Submit every task and wait for all of them, in submission order.
   */
  runAll<R>(tasks: PoolTask<R>[]): Promise<TaskResult<R>[]> {
    return Promise.all(tasks.map(task => this.submit(task)));
  }

  getStats(): PoolStats {
    return {
      queuedTasks: this.queue.length,
      activeTasks: this.active,
      completedTasks: this.completed,
      erroredTasks: this.errored
    };
  }

  private next(): void {
    while (this.active < this.config.concurrency && this.queue.length > 0) {
      const queued = this.queue.shift();
      queued?.start();
    }
  }
}
