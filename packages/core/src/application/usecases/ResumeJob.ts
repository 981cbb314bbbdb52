import type { PipelineContext } from '../PipelineContext.js';
import type { JobStatus } from '../../domain/model/JobStatus.js';
import { isTerminalStatus } from '../../domain/model/JobStatus.js';
import { JobNotFoundError } from '../../domain/errors/PipelineErrors.js';
import type { MergeJobResults } from './MergeJobResults.js';

export interface ResumeResult {
  readonly jobId: string;
  readonly status: JobStatus;
  /** Tasks put on the queue by this call. */
  readonly enqueued: number;
  /** Abandoned claims released by this call. */
  readonly reclaimed: number;
}

/**
 * Use case: (re)drive a job from its persisted state.
 *
 * Starts a `PENDING` job, releases claims whose worker is presumed dead, and
 * enqueues one task per batch that is not `COMPLETED`. A job that already
 * has a `FAILED` batch is failed instead, with nothing enqueued. A
 * batch still backing off is enqueued with its remaining delay. When nothing
 * is outstanding the merge is attempted instead, which finishes a job whose
 * process died between its last batch and the merge.
 *
 * Terminal jobs are left alone: resuming one enqueues nothing.
 */
export class ResumeJob {
  constructor(
    private readonly ctx: PipelineContext,
    private readonly merger: MergeJobResults,
  ) {}

  async execute(jobId: string): Promise<ResumeResult> {
    const logger = this.ctx.logger.child('resume');
    const store = this.ctx.stateStore;

    let job = await store.getJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    if (job.status === 'PENDING') {
      const started = await store.transitionJob(jobId, ['PENDING'], 'RUNNING', { startedAt: Date.now() });
      job = await store.getJob(jobId);
      if (!job) {
        throw new JobNotFoundError(jobId);
      }
      if (started) {
        this.ctx.eventBus.emit({
          type: 'job:started',
          jobId,
          totalBatches: job.totalBatches,
          timestamp: Date.now(),
        });
      }
    }

    if (isTerminalStatus(job.status)) {
      logger.debug('Job is terminal, nothing to resume', { jobId, status: job.status });
      return { jobId, status: job.status, enqueued: 0, reclaimed: 0 };
    }

    const reclaimed = await store.reclaimStaleBatches(jobId, this.ctx.settings.staleClaimTimeoutMs);
    if (reclaimed > 0) {
      logger.warn('Released abandoned claims', { jobId, reclaimed });
    }

    const batches = await store.getBatches(jobId);
    const failedBatch = batches.find((b) => b.status === 'FAILED');
    if (failedBatch) {
      logger.warn('Job has a failed batch, failing it instead of resuming', { jobId, batchIndex: failedBatch.index });
      await this.merger.tryMerge(jobId);
      const current = await store.getJob(jobId);
      return { jobId, status: current?.status ?? job.status, enqueued: 0, reclaimed };
    }

    const now = Date.now();
    let enqueued = 0;
    for (const batch of batches) {
      if (batch.status === 'COMPLETED') continue;
      await this.ctx.enqueueBatch(batch, Math.max(0, (batch.availableAt ?? now) - now));
      enqueued++;
    }

    const completed = (await store.getCompletedBatchIds(jobId)).length;
    logger.info('Job resumed', { jobId, enqueued, completed, reclaimed });

    if (enqueued === 0) {
      await this.merger.tryMerge(jobId);
    }

    const current = await store.getJob(jobId);
    return { jobId, status: current?.status ?? job.status, enqueued, reclaimed };
  }
}
