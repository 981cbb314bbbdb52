import type { PipelineContext } from '../PipelineContext.js';
import type { Job } from '../../domain/model/Job.js';
import { InvalidJobStateError, JobNotFoundError } from '../../domain/errors/PipelineErrors.js';

/**
 * Use case: cancel a job permanently. A cancelled job cannot be resumed.
 *
 * Queued tasks of the job are dropped and any later claim is refused.
 * Batches already claimed finish their current attempt; nothing is merged.
 */
export class CancelJob {
  constructor(private readonly ctx: PipelineContext) {}

  async execute(jobId: string): Promise<Job> {
    const cancelled = await this.ctx.stateStore.transitionJob(jobId, ['PENDING', 'RUNNING'], 'CANCELLED', {
      completedAt: Date.now(),
    });
    const job = await this.ctx.stateStore.getJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    if (!cancelled) {
      throw new InvalidJobStateError(`Cannot cancel job '${jobId}' from status '${job.status}'`);
    }

    const droppedTasks = await this.ctx.queue.drop(jobId);
    this.ctx.logger.child('cancel').info('Job cancelled', { jobId, droppedTasks });
    this.ctx.eventBus.emit({ type: 'job:cancelled', jobId, droppedTasks, timestamp: Date.now() });
    return job;
  }
}
