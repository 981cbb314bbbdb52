import { randomUUID } from 'node:crypto';
import type { PipelineContext } from '../PipelineContext.js';
import type { Job } from '../../domain/model/Job.js';
import type { Batch } from '../../domain/model/Batch.js';
import { batchIdFor, createBatch } from '../../domain/model/Batch.js';
import { InvalidJobStateError, JobNotFoundError } from '../../domain/errors/PipelineErrors.js';

export interface RerunResult {
  readonly jobId: string;
  readonly rerunOf: string;
  /** Completed batches whose output the new job reuses. */
  readonly carriedOver: number;
  /** Batches the new job will attempt again from scratch. */
  readonly reset: number;
}

/**
 * Use case: operator override for a `FAILED` or `CANCELLED` job.
 *
 * Terminal jobs are never reopened. Instead a new `PENDING` job is created
 * over the same input fragments: completed batches are carried over with
 * their outputs, every other batch starts again with no attempts used.
 * Resuming the new job re-runs only that remainder.
 */
export class RerunJob {
  constructor(private readonly ctx: PipelineContext) {}

  async execute(jobId: string): Promise<RerunResult> {
    const previous = await this.ctx.stateStore.getJob(jobId);
    if (!previous) {
      throw new JobNotFoundError(jobId);
    }
    if (previous.status !== 'FAILED' && previous.status !== 'CANCELLED') {
      throw new InvalidJobStateError(`Only failed or cancelled jobs can be re-run; job '${jobId}' is ${previous.status}`);
    }

    const nextId = randomUUID();
    const batches = (await this.ctx.stateStore.getBatches(jobId)).map((batch) => this.carry(batch, nextId, previous));
    const carriedOver = batches.filter((b) => b.status === 'COMPLETED').length;

    const job: Job = {
      id: nextId,
      owner: previous.owner,
      status: 'PENDING',
      createdAt: Date.now(),
      totalBatches: previous.totalBatches,
      totalTargets: previous.totalTargets,
      batchSize: previous.batchSize,
      maxRetries: previous.maxRetries,
      inputRef: previous.inputRef,
      metadata: previous.metadata,
      rerunOf: previous.id,
    };
    await this.ctx.stateStore.createJob(job, batches);

    this.ctx.logger.child('rerun').info('Job re-run created', {
      jobId: nextId,
      rerunOf: jobId,
      carriedOver,
      reset: batches.length - carriedOver,
    });
    this.ctx.eventBus.emit({
      type: 'job:submitted',
      jobId: nextId,
      totalTargets: job.totalTargets,
      totalBatches: job.totalBatches,
      timestamp: Date.now(),
    });

    return { jobId: nextId, rerunOf: jobId, carriedOver, reset: batches.length - carriedOver };
  }

  private carry(batch: Batch, jobId: string, previous: Job): Batch {
    if (batch.status === 'COMPLETED') {
      return { ...batch, id: batchIdFor(jobId, batch.index), jobId };
    }
    return createBatch({
      jobId,
      index: batch.index,
      maxRetries: previous.maxRetries,
      inputRef: batch.inputRef,
      targetCount: batch.targetCount,
      firstTargetIndex: batch.firstTargetIndex,
    });
  }
}
