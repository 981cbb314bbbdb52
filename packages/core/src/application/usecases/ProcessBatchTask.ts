import type { PipelineContext } from '../PipelineContext.js';
import type { Batch } from '../../domain/model/Batch.js';
import type { JobFailure } from '../../domain/model/Job.js';
import type { ExtractedRecord, Target } from '../../domain/model/Target.js';
import type { BatchTask } from '../../domain/ports/TaskQueue.js';
import type { ExtractionContext } from '../../domain/ports/ExtractionService.js';
import {
  PipelineError,
  TransientError,
  isPermanentFailure,
  toErrorMessage,
} from '../../domain/errors/PipelineErrors.js';
import type { MergeJobResults } from './MergeJobResults.js';

/** What became of one dequeued task. */
export type BatchTaskOutcome =
  /** Output stored, batch `COMPLETED`. */
  | 'completed'
  /** Attempt failed; the batch is back on the queue after its backoff. */
  | 'retrying'
  /** Attempt failed and the batch is exhausted; the job failed with it. */
  | 'failed'
  /** The batch was still backing off; the task went back on the queue. */
  | 'deferred'
  /** The batch could not be claimed (already done, claimed elsewhere, job not running). */
  | 'skipped';

/**
 * Use case: one attempt at one batch, as run by a worker.
 *
 * Claims the batch, extracts its targets and stores the output under a ref
 * of its own attempt, so a worker whose claim was taken over never touches
 * the output the batch completes with. A failed attempt is recorded in the
 * store and, while attempts remain, the batch is re-enqueued with a delay
 * instead of the worker waiting out the backoff.
 * An exhausted batch fails its whole job (fail-fast): the job's remaining
 * queued tasks are dropped and no merge happens.
 */
export class ProcessBatchTask {
  constructor(
    private readonly ctx: PipelineContext,
    private readonly merger: MergeJobResults,
  ) {}

  async execute(task: BatchTask, workerId: string): Promise<BatchTaskOutcome> {
    const logger = this.ctx.logger.child('worker');
    const claim = await this.ctx.stateStore.claimBatch(task.jobId, workerId, { batchId: task.batchId });

    if (!claim.claimed) {
      if (claim.reason === 'BATCH_BACKING_OFF') {
        const delayMs = Math.max(0, claim.availableAt - Date.now());
        await this.ctx.queue.enqueue({ ...task, enqueuedAt: Date.now() }, { delayMs });
        logger.debug('Batch still backing off, task deferred', { ...task, delayMs });
        return 'deferred';
      }
      logger.debug('Batch not claimed, task dropped', { ...task, reason: claim.reason });
      this.ctx.eventBus.emit({
        type: 'batch:skipped',
        jobId: task.jobId,
        batchId: task.batchId,
        reason: claim.reason,
        timestamp: Date.now(),
      });
      return 'skipped';
    }

    const batch = claim.batch;
    this.ctx.eventBus.emit({
      type: 'batch:claimed',
      jobId: batch.jobId,
      batchId: batch.id,
      batchIndex: batch.index,
      workerId,
      attempt: batch.attemptCount,
      timestamp: Date.now(),
    });

    let recordCount: number;
    try {
      const targets = await this.ctx.fragments.readInput(batch.inputRef);
      const records = await this.extract(targets, batch);
      const outputRef = await this.ctx.fragments.writeOutput(batch.jobId, batch.index, batch.attemptCount, records);
      recordCount = records.length;

      const completed = await this.ctx.stateStore.completeBatch(batch.jobId, batch.id, workerId, {
        outputRef,
        recordCount,
      });
      if (!completed) {
        await this.ctx.fragments.removeFragments([outputRef]);
        logger.warn('Claim lost before completion, output discarded', {
          jobId: batch.jobId,
          batchId: batch.id,
          attempt: batch.attemptCount,
        });
        return 'skipped';
      }
    } catch (error) {
      return this.handleFailure(task, batch, workerId, error);
    }

    logger.info('Batch completed', {
      jobId: batch.jobId,
      batchIndex: batch.index,
      attempt: batch.attemptCount,
      recordCount,
    });
    this.ctx.eventBus.emit({
      type: 'batch:completed',
      jobId: batch.jobId,
      batchId: batch.id,
      batchIndex: batch.index,
      recordCount,
      attempt: batch.attemptCount,
      timestamp: Date.now(),
    });
    await this.emitProgress(batch.jobId);

    await this.merger.tryMerge(batch.jobId);
    return 'completed';
  }

  private async extract(targets: readonly Target[], batch: Batch): Promise<readonly ExtractedRecord[]> {
    const controller = new AbortController();
    const context: ExtractionContext = {
      jobId: batch.jobId,
      batchId: batch.id,
      batchIndex: batch.index,
      attempt: batch.attemptCount,
      signal: controller.signal,
    };

    const timeoutMs = this.ctx.settings.extractionTimeoutMs;
    if (timeoutMs <= 0) {
      return this.ctx.extraction.extract(targets, context);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const error = new TransientError(`Extraction timed out after ${String(timeoutMs)}ms`);
        reject(error);
        controller.abort(error);
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.ctx.extraction.extract(targets, context), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async handleFailure(task: BatchTask, batch: Batch, workerId: string, error: unknown): Promise<BatchTaskOutcome> {
    const logger = this.ctx.logger.child('worker');
    const permanent = isPermanentFailure(error);
    const message = toErrorMessage(error);
    const delayMs = this.ctx.retryPolicy.delayFor(batch.attemptCount, error);

    const updated = await this.ctx.stateStore.failBatch(batch.jobId, batch.id, workerId, {
      error: message,
      permanent,
      retryDelayMs: delayMs,
    });
    if (!updated) {
      logger.warn('Claim lost before failure was recorded', { jobId: batch.jobId, batchId: batch.id, error });
      return 'skipped';
    }

    if (updated.status === 'PENDING') {
      logger.warn('Batch attempt failed, retrying', {
        jobId: batch.jobId,
        batchIndex: batch.index,
        attempt: batch.attemptCount,
        delayMs,
        error,
      });
      this.ctx.eventBus.emit({
        type: 'batch:retrying',
        jobId: batch.jobId,
        batchId: batch.id,
        batchIndex: batch.index,
        attempt: batch.attemptCount,
        maxRetries: batch.maxRetries,
        delayMs,
        error: message,
        timestamp: Date.now(),
      });
      await this.ctx.queue.enqueue({ ...task, enqueuedAt: Date.now() }, { delayMs });
      return 'retrying';
    }

    logger.error('Batch failed', {
      jobId: batch.jobId,
      batchIndex: batch.index,
      attempts: updated.attemptCount,
      permanent,
      error,
    });
    this.ctx.eventBus.emit({
      type: 'batch:failed',
      jobId: batch.jobId,
      batchId: batch.id,
      batchIndex: batch.index,
      attempt: updated.attemptCount,
      error: message,
      timestamp: Date.now(),
    });

    await this.failJob(updated, {
      code: failureCode(error, permanent),
      message,
      batchId: updated.id,
      batchIndex: updated.index,
    });
    return 'failed';
  }

  /** Fail-fast: one exhausted batch fails the job. */
  private async failJob(batch: Batch, failure: JobFailure): Promise<void> {
    const failed = await this.ctx.stateStore.transitionJob(batch.jobId, ['RUNNING'], 'FAILED', {
      completedAt: Date.now(),
      failure,
    });
    if (!failed) return;

    const dropped = await this.ctx.queue.drop(batch.jobId);
    this.ctx.logger.child('worker').error('Job failed', { jobId: batch.jobId, droppedTasks: dropped, ...failure });
    this.ctx.eventBus.emit({ type: 'job:failed', jobId: batch.jobId, failure, timestamp: Date.now() });
    await this.ctx.notify(batch.jobId);
  }

  private async emitProgress(jobId: string): Promise<void> {
    const job = await this.ctx.stateStore.getJob(jobId);
    if (!job) return;
    const batches = await this.ctx.stateStore.getBatches(jobId);
    this.ctx.eventBus.emit({
      type: 'job:progress',
      jobId,
      progress: this.ctx.buildProgress(job, batches),
      timestamp: Date.now(),
    });
  }
}

function failureCode(error: unknown, permanent: boolean): string {
  if (!permanent) return 'RETRIES_EXHAUSTED';
  return error instanceof PipelineError ? error.code : 'PERMANENT';
}
