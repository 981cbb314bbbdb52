import type { Batch } from './Batch.js';

/** Reason why a batch claim attempt failed. */
export type ClaimBatchFailureReason =
  | 'JOB_NOT_FOUND'
  | 'JOB_NOT_RUNNING'
  | 'BATCH_NOT_FOUND'
  | 'BATCH_NOT_CLAIMABLE'
  | 'BATCH_BACKING_OFF'
  | 'NO_PENDING_BATCHES';

/** Result of attempting to claim a batch. */
export type ClaimBatchResult =
  | { readonly claimed: true; readonly batch: Batch }
  | { readonly claimed: false; readonly reason: 'BATCH_BACKING_OFF'; readonly availableAt: number }
  | { readonly claimed: false; readonly reason: Exclude<ClaimBatchFailureReason, 'BATCH_BACKING_OFF'> };

export interface ClaimBatchOptions {
  /** Claim this batch only. Without it, the lowest-index eligible batch is claimed. */
  readonly batchId?: string;
}
