export type Task = () => Promise<void> | void;

export interface WorkerPoolOptions {
  /** Upper bound on spawned workers. */
  max: number;
  /** Aborting it stops the pool as if `stop()` had been called. */
  signal?: AbortSignal;
}

interface Handoff {
  task: Task;
  accept: (accepted: boolean) => void;
}

/**
 * Bounded pool of async workers running no-argument tasks.
 *
 * Workers are spawned lazily, one per `add` that finds no idle worker, until
 * `max` is reached. Past that, `add` waits until a worker picks the task up;
 * the pool itself never queues more than the callers waiting on it.
 */
export class WorkerPool {
  private readonly max: number;
  private readonly signal?: AbortSignal;
  private readonly idle: Array<(task: Task | null) => void> = [];
  private readonly waiting: Handoff[] = [];
  private readonly workers = new Set<Promise<void>>();
  private spawned = 0;
  private stopped = false;
  private stopping: Promise<void> | null = null;
  private markStopped: () => void = () => {};
  private readonly whenStopped: Promise<void>;
  private readonly onAbort = (): void => {
    void this.stop();
  };

  constructor(options: WorkerPoolOptions) {
    this.max = Math.max(1, Math.trunc(options.max));
    this.signal = options.signal;
    this.whenStopped = new Promise<void>((resolve) => {
      this.markStopped = resolve;
    });

    this.signal?.addEventListener("abort", this.onAbort, { once: true });
  }

  get size(): number {
    return this.spawned;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Submit a task. Resolves true once a worker has taken it, false when the
   * pool was stopped or cancelled before that happened (the task never runs).
   */
  add(task: Task): Promise<boolean> {
    if (this.stopped || this.signal?.aborted) return Promise.resolve(false);

    const worker = this.idle.shift();
    if (worker) {
      worker(task);
      return Promise.resolve(true);
    }

    if (this.spawned < this.max) {
      this.spawned += 1;
      this.spawn(task);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((accept) => {
      this.waiting.push({ task, accept });
    });
  }

  /** Stop every worker and resolve once they have all finished their task. */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    this.stopped = true;
    this.signal?.removeEventListener("abort", this.onAbort);

    for (const handoff of this.waiting.splice(0)) handoff.accept(false);
    for (const worker of this.idle.splice(0)) worker(null);

    this.stopping = Promise.all(this.workers).then(() => this.markStopped());
    return this.stopping;
  }

  /** Resolves when a prior or later `stop()` has drained the pool. */
  waitOnStop(): Promise<void> {
    return this.whenStopped;
  }

  private spawn(first: Task): void {
    const worker = this.work(first).finally(() => {
      this.spawned -= 1;
      this.workers.delete(worker);
    });
    this.workers.add(worker);
  }

  private async work(first: Task): Promise<void> {
    let task: Task | null = first;

    while (task) {
      try {
        await task();
      } catch (error) {
        console.error("Worker task failed:", error);
      }
      task = await this.take();
    }
  }

  private take(): Promise<Task | null> {
    if (this.stopped) return Promise.resolve(null);

    const handoff = this.waiting.shift();
    if (handoff) {
      handoff.accept(true);
      return Promise.resolve(handoff.task);
    }

    return new Promise<Task | null>((resolve) => this.idle.push(resolve));
  }
}
