import type { PipelineContext } from './PipelineContext.js';
import type { ProcessBatchTask } from './usecases/ProcessBatchTask.js';
import type { BatchTask } from '../domain/ports/TaskQueue.js';

/** One worker: takes tasks off the queue one at a time until told to stop. */
export class BatchWorker {
  constructor(
    readonly workerId: string,
    private readonly ctx: PipelineContext,
    private readonly processTask: ProcessBatchTask,
  ) {}

  async run(signal: AbortSignal): Promise<void> {
    const logger = this.ctx.logger.child('worker');
    logger.debug('Worker started', { workerId: this.workerId });

    while (!signal.aborted) {
      let task: BatchTask | null;
      try {
        task = await this.ctx.queue.dequeue(signal);
      } catch (error) {
        logger.error('Dequeue failed, worker stopping', { workerId: this.workerId, error });
        break;
      }
      if (!task) break;

      try {
        await this.processTask.execute(task, this.workerId);
      } catch (error) {
        // The batch stays claimed; stale-claim recovery on the next resume releases it.
        logger.error('Batch task failed', { ...task, workerId: this.workerId, error });
      }
    }

    logger.debug('Worker stopped', { workerId: this.workerId });
  }
}

/**
 * Fixed-size pool of `BatchWorker`s. The pool size bounds the number of
 * extraction calls in flight.
 */
export class WorkerPool {
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];

  constructor(
    private readonly ctx: PipelineContext,
    private readonly processTask: ProcessBatchTask,
    private readonly concurrency: number,
    private readonly workerIdPrefix: string,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError('Worker concurrency must be a positive integer');
    }
  }

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    for (let i = 0; i < this.concurrency; i++) {
      const worker = new BatchWorker(`${this.workerIdPrefix}-${String(i)}`, this.ctx, this.processTask);
      this.loops.push(worker.run(controller.signal));
    }
    this.ctx.logger.child('pool').info('Worker pool started', { concurrency: this.concurrency });
  }

  /** Stop taking new tasks and wait for the tasks in progress to finish. */
  async stop(): Promise<void> {
    if (!this.controller) return;
    this.controller.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.controller = null;
    this.ctx.logger.child('pool').info('Worker pool stopped');
  }
}
