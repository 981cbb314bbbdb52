/** Unit of work on the queue: one batch to attempt. */
export interface BatchTask {
  readonly jobId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly enqueuedAt: number;
}

export interface EnqueueOptions {
  /** Hold the task back for this long before it can be dequeued. Default: `0`. */
  readonly delayMs?: number;
}

/**
 * Port for dispatching batch tasks to workers.
 *
 * Delivery is at-least-once and unordered across batches; the store's claim
 * step turns duplicates into no-ops. The queue is not durable: after a crash
 * the resume controller rebuilds it from persisted batch state.
 */
export interface TaskQueue {
  enqueue(task: BatchTask, options?: EnqueueOptions): Promise<void>;
  /**
   * Take the next ready task, waiting while the queue is empty.
   * Resolves `null` once the queue is closed or `signal` aborts.
   */
  dequeue(signal?: AbortSignal): Promise<BatchTask | null>;
  /** Remove every queued or delayed task of a job. Returns how many were removed. */
  drop(jobId: string): Promise<number>;
  /** Tasks queued or delayed. */
  size(): number;
  close(): void;
}
