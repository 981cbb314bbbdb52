import type { PipelineContext } from '../PipelineContext.js';
import type { Job, JobProgress } from '../../domain/model/Job.js';
import type { Batch, BatchCounts } from '../../domain/model/Batch.js';
import { countBatches } from '../../domain/services/BatchLifecycle.js';
import { JobNotFoundError } from '../../domain/errors/PipelineErrors.js';

/** Snapshot of a job with its batches. */
export interface JobStatusResult {
  readonly job: Job;
  readonly counts: BatchCounts;
  readonly progress: JobProgress;
  readonly batches: readonly Batch[];
}

/** Use case: read the current state of a job from the store. */
export class GetJobStatus {
  constructor(private readonly ctx: PipelineContext) {}

  async execute(jobId: string): Promise<JobStatusResult> {
    const job = await this.ctx.stateStore.getJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    const batches = await this.ctx.stateStore.getBatches(jobId);
    return {
      job,
      counts: countBatches(batches),
      progress: this.ctx.buildProgress(job, batches),
      batches,
    };
  }
}
