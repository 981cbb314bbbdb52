import type { PipelineContext } from '../PipelineContext.js';
import type { Batch } from '../../domain/model/Batch.js';
import type { Job, JobFailure } from '../../domain/model/Job.js';
import type { ExtractedRecord } from '../../domain/model/Target.js';
import type { OutputFragment } from '../../domain/ports/FragmentStore.js';
import { IntegrityError, toErrorMessage } from '../../domain/errors/PipelineErrors.js';
import { countBatches } from '../../domain/services/BatchLifecycle.js';

/**
 * Use case: combine the outputs of a finished job into its final artifact.
 *
 * A `FAILED` batch fails a `RUNNING` job at once, whatever state its other
 * batches are in, and drops its queued tasks. Otherwise the merge runs only
 * once no batch is `PENDING` or `CLAIMED`. Every output fragment is read in
 * ascending batch index and streamed into the artifact: empty fragments are
 * skipped, and a fragment that is missing, corrupt or
 * holds a different number of records than its batch recorded aborts the
 * merge and fails the job with code `INTEGRITY`.
 *
 * The final `RUNNING → COMPLETED` compare-and-set makes completion happen
 * once even when several processes merge the same job; the artifact they
 * write is identical.
 */
export class MergeJobResults {
  private readonly inFlight = new Map<string, Promise<Job | null>>();

  constructor(private readonly ctx: PipelineContext) {}

  /**
   * Merge if the job is ready. Concurrent calls for one job share a single run.
   *
   * @returns The job when this call moved it to a terminal status, otherwise `null`.
   */
  tryMerge(jobId: string): Promise<Job | null> {
    const running = this.inFlight.get(jobId);
    if (running) return running;

    const run = this.merge(jobId).finally(() => {
      this.inFlight.delete(jobId);
    });
    this.inFlight.set(jobId, run);
    return run;
  }

  private async merge(jobId: string): Promise<Job | null> {
    const logger = this.ctx.logger.child('merge');
    const store = this.ctx.stateStore;

    const job = await store.getJob(jobId);
    if (job?.status !== 'RUNNING') return null;

    const batches = await store.getBatches(jobId);

    const failedBatch = batches.find((b) => b.status === 'FAILED');
    if (failedBatch) {
      return this.failJob(jobId, {
        code: 'BATCH_FAILED',
        message: failedBatch.lastError ?? 'Batch failed',
        batchId: failedBatch.id,
        batchIndex: failedBatch.index,
      });
    }

    if (!countBatches(batches).settled) return null;

    const expected = batches.reduce((sum, b) => sum + (b.recordCount ?? 0), 0);
    logger.info('Merging job results', { jobId, batches: batches.length, expectedRecords: expected });

    let artifact: { ref: string; recordCount: number };
    try {
      artifact = await this.ctx.fragments.writeArtifact(jobId, this.records(batches));
      if (artifact.recordCount !== expected) {
        throw new IntegrityError(
          `Merged ${String(artifact.recordCount)} records, batches recorded ${String(expected)}`,
        );
      }
    } catch (error) {
      if (!(error instanceof IntegrityError)) throw error;
      logger.error('Merge aborted', { jobId, batchIndex: error.batchIndex, error });
      const batch = batches.find((b) => b.index === error.batchIndex);
      return this.failJob(jobId, {
        code: error.code,
        message: toErrorMessage(error),
        batchId: batch?.id,
        batchIndex: error.batchIndex,
      });
    }

    const completedAt = Date.now();
    const completed = await store.transitionJob(jobId, ['RUNNING'], 'COMPLETED', {
      completedAt,
      finalArtifactRef: artifact.ref,
    });
    if (!completed) {
      logger.debug('Job left RUNNING during merge', { jobId });
      return null;
    }

    logger.info('Job completed', { jobId, recordCount: artifact.recordCount, artifact: artifact.ref });
    this.ctx.eventBus.emit({
      type: 'job:completed',
      jobId,
      finalArtifactRef: artifact.ref,
      recordCount: artifact.recordCount,
      timestamp: completedAt,
    });
    await this.ctx.notify(jobId);
    return store.getJob(jobId);
  }

  private async *records(batches: readonly Batch[]): AsyncIterable<ExtractedRecord> {
    for (const batch of batches) {
      if (batch.outputRef === undefined) {
        throw new IntegrityError(`Batch ${String(batch.index)} has no output`, { batchIndex: batch.index });
      }

      let fragment: OutputFragment;
      try {
        fragment = await this.ctx.fragments.readOutput(batch.outputRef);
      } catch (error) {
        if (error instanceof IntegrityError) {
          throw new IntegrityError(error.message, { cause: error, batchIndex: batch.index });
        }
        throw error;
      }

      if (fragment.batchIndex !== batch.index || fragment.recordCount !== batch.recordCount) {
        throw new IntegrityError(
          `Output of batch ${String(batch.index)} does not match its batch record ` +
            `(fragment index ${String(fragment.batchIndex)}, ${String(fragment.recordCount)} records; ` +
            `expected ${String(batch.recordCount ?? 0)})`,
          { batchIndex: batch.index },
        );
      }

      if (fragment.records.length === 0) {
        this.ctx.logger.child('merge').info('Skipping empty fragment', { jobId: batch.jobId, batchIndex: batch.index });
        this.ctx.eventBus.emit({
          type: 'merge:fragment-skipped',
          jobId: batch.jobId,
          batchId: batch.id,
          batchIndex: batch.index,
          timestamp: Date.now(),
        });
        continue;
      }

      yield* fragment.records;
    }
  }

  private async failJob(jobId: string, failure: JobFailure): Promise<Job | null> {
    const failed = await this.ctx.stateStore.transitionJob(jobId, ['RUNNING'], 'FAILED', {
      completedAt: Date.now(),
      failure,
    });
    if (!failed) return null;

    const dropped = await this.ctx.queue.drop(jobId);
    this.ctx.logger.child('merge').error('Job failed', { jobId, droppedTasks: dropped, ...failure });
    this.ctx.eventBus.emit({ type: 'job:failed', jobId, failure, timestamp: Date.now() });
    await this.ctx.notify(jobId);
    return this.ctx.stateStore.getJob(jobId);
  }
}
