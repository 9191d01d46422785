export const DEFAULT_CONCURRENCY = 20;

export type RunOptions = {
  /** Aborting removes the task from the queue. A task that already started keeps running. */
  signal?: AbortSignal;
};

export type WorkerPool = {
  readonly active: number;
  readonly pending: number;
  run<TResult>(task: () => Promise<TResult>, options?: RunOptions): Promise<TResult>;
};

export class TaskCancelledError extends Error {
  constructor() {
    super("Task was cancelled before it started");
    this.name = "TaskCancelledError";
  }
}

type QueuedTask = () => void;

/**
 * Runs at most `concurrency` tasks at once. Extra tasks wait in FIFO order and
 * start as soon as a running task settles, whether it resolved or rejected.
 */
export function createWorkerPool(concurrency: number): WorkerPool {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Worker pool concurrency must be a positive integer, got ${concurrency}`);
  }

  const queue: QueuedTask[] = [];
  let active = 0;

  function startNext(): void {
    if (active >= concurrency) {
      return;
    }

    const next = queue.shift();
    if (next) {
      next();
    }
  }

  return {
    get active() {
      return active;
    },
    get pending() {
      return queue.length;
    },
    run<TResult>(task: () => Promise<TResult>, { signal }: RunOptions = {}): Promise<TResult> {
      return new Promise<TResult>((resolve, reject) => {
        if (signal?.aborted) {
          reject(new TaskCancelledError());
          return;
        }

        const cancel = (): void => {
          const index = queue.indexOf(start);
          if (index !== -1) {
            queue.splice(index, 1);
            reject(new TaskCancelledError());
          }
        };

        function start(): void {
          signal?.removeEventListener("abort", cancel);
          active += 1;

          let running: Promise<TResult>;
          try {
            running = task();
          } catch (error) {
            running = Promise.reject(error);
          }

          void running.then(resolve, reject).finally(() => {
            active -= 1;
            startNext();
          });
        }

        signal?.addEventListener("abort", cancel, { once: true });
        queue.push(start);
        startNext();
      });
    },
  };
}
