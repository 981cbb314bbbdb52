import type { Job, JobListFilter, JobTransitionPatch } from '../model/Job.js';
import type { JobStatus } from '../model/JobStatus.js';
import type { Batch, BatchCompletion, BatchCounts, BatchFailure } from '../model/Batch.js';
import type { ClaimBatchOptions, ClaimBatchResult } from '../model/BatchClaim.js';

/**
 * Port for persisting jobs and their batches.
 *
 * The store is the only owner of `Job` and `Batch` records: workers, the
 * resume controller and the merger change them exclusively through this API.
 * Every mutation is a conditional update on the current state, so concurrent
 * callers never both succeed.
 *
 * Built-in implementations: `InMemoryStateStore` (volatile), `FileStateStore`
 * (single process) and `SequelizeStateStore` from `@scrapeflow/state-sequelize`
 * (shared by several processes).
 */
export interface StateStore {
  /**
   * Insert a job and all of its batches in one atomic step.
   * Rejects a duplicate job id or two batches with the same index.
   */
  createJob(job: Job, batches: readonly Batch[]): Promise<void>;
  getJob(jobId: string): Promise<Job | null>;
  /** Jobs matching the filter, newest first. */
  listJobs(filter?: JobListFilter): Promise<readonly Job[]>;
  /**
   * Compare-and-set on the job status: moves the job to `to` only while its
   * status is one of `from`.
   *
   * @returns `false` when the job is missing or its status is not in `from`.
   * @throws InvalidJobStateError when `from` contains a status that may not move to `to`.
   */
  transitionJob(
    jobId: string,
    from: readonly JobStatus[],
    to: JobStatus,
    patch?: JobTransitionPatch,
  ): Promise<boolean>;
  /** Stamp `archivedAt` on a terminal job. `false` when missing or not terminal. */
  archiveJob(jobId: string): Promise<boolean>;

  /** All batches of a job, ascending by index. */
  getBatches(jobId: string): Promise<readonly Batch[]>;
  getBatch(jobId: string, batchId: string): Promise<Batch | null>;
  /**
   * Atomically move an eligible batch from `PENDING` to `CLAIMED`, increment
   * its `attemptCount` and record the claimant. The only concurrency-control
   * point of the pipeline.
   */
  claimBatch(jobId: string, workerId: string, options?: ClaimBatchOptions): Promise<ClaimBatchResult>;
  /** `CLAIMED` (by `workerId`) → `COMPLETED`. Never touches the job. */
  completeBatch(jobId: string, batchId: string, workerId: string, completion: BatchCompletion): Promise<boolean>;
  /**
   * Record a failed attempt. The batch becomes `FAILED` when the failure is
   * permanent or no attempt is left, otherwise `PENDING` until the backoff ends.
   *
   * @returns The updated batch, or `null` when `workerId` does not hold the claim.
   */
  failBatch(jobId: string, batchId: string, workerId: string, failure: BatchFailure): Promise<Batch | null>;
  /**
   * Release claims older than `timeoutMs` (their worker is presumed dead).
   * A released batch goes back to `PENDING`, or to `FAILED` when that claim
   * was its last permitted attempt.
   *
   * @returns Number of batches released.
   */
  reclaimStaleBatches(jobId: string, timeoutMs: number): Promise<number>;
  getBatchCounts(jobId: string): Promise<BatchCounts>;
  /** The progress ledger: ids of the job's `COMPLETED` batches. Membership only grows. */
  getCompletedBatchIds(jobId: string): Promise<readonly string[]>;
}
