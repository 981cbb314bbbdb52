import type { BatchTask, EnqueueOptions, TaskQueue } from '../../domain/ports/TaskQueue.js';

interface Waiter {
  readonly resolve: (task: BatchTask | null) => void;
  readonly cleanup: () => void;
}

/**
 * FIFO task queue held in memory. Delayed tasks wait on a timer and join the
 * back of the queue when it fires. Lost when the process exits.
 */
export class InMemoryTaskQueue implements TaskQueue {
  private readonly ready: BatchTask[] = [];
  private readonly delayed = new Map<ReturnType<typeof setTimeout>, BatchTask>();
  private readonly waiters: Waiter[] = [];
  private closed = false;

  enqueue(task: BatchTask, options?: EnqueueOptions): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('Task queue is closed'));
    }

    const delayMs = options?.delayMs ?? 0;
    if (delayMs > 0) {
      const timer = setTimeout(() => {
        this.delayed.delete(timer);
        this.push(task);
      }, delayMs);
      this.delayed.set(timer, task);
    } else {
      this.push(task);
    }
    return Promise.resolve();
  }

  dequeue(signal?: AbortSignal): Promise<BatchTask | null> {
    const next = this.ready.shift();
    if (next) return Promise.resolve(next);
    if (this.closed || signal?.aborted) return Promise.resolve(null);

    return new Promise((resolve) => {
      const onAbort = (): void => {
        const position = this.waiters.indexOf(waiter);
        if (position !== -1) this.waiters.splice(position, 1);
        resolve(null);
      };
      const waiter: Waiter = {
        resolve,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  drop(jobId: string): Promise<number> {
    let dropped = 0;
    for (let i = this.ready.length - 1; i >= 0; i--) {
      if (this.ready[i]?.jobId === jobId) {
        this.ready.splice(i, 1);
        dropped++;
      }
    }
    for (const [timer, task] of this.delayed) {
      if (task.jobId === jobId) {
        clearTimeout(timer);
        this.delayed.delete(timer);
        dropped++;
      }
    }
    return Promise.resolve(dropped);
  }

  size(): number {
    return this.ready.length + this.delayed.size;
  }

  /** Discard every task and release all waiting consumers with `null`. */
  close(): void {
    this.closed = true;
    for (const timer of this.delayed.keys()) {
      clearTimeout(timer);
    }
    this.delayed.clear();
    this.ready.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter.cleanup();
      waiter.resolve(null);
    }
  }

  private push(task: BatchTask): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(task);
      return;
    }
    this.ready.push(task);
  }
}
