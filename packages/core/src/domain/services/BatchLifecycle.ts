import type { Batch, BatchCompletion, BatchCounts, BatchFailure } from '../model/Batch.js';
import type { ClaimBatchResult } from '../model/BatchClaim.js';

/**
 * Pure transition rules for batches, shared by the state store adapters.
 * Each function takes the current batch and returns its next version; the
 * adapters are responsible for applying it atomically.
 */

/** Claims a batch may receive in total. */
export function attemptLimit(batch: Batch): number {
  return batch.maxRetries + 1;
}

/**
 * Why `batch` cannot be claimed at `now`, or `null` when it can.
 * Only a `PENDING` batch with attempts left and no running backoff is eligible.
 */
export function claimRejection(batch: Batch, now: number): Exclude<ClaimBatchResult, { claimed: true }> | null {
  if (batch.status !== 'PENDING' || batch.attemptCount >= attemptLimit(batch)) {
    return { claimed: false, reason: 'BATCH_NOT_CLAIMABLE' };
  }
  if (batch.availableAt !== undefined && batch.availableAt > now) {
    return { claimed: false, reason: 'BATCH_BACKING_OFF', availableAt: batch.availableAt };
  }
  return null;
}

export function applyClaim(batch: Batch, workerId: string, now: number): Batch {
  return {
    ...batch,
    status: 'CLAIMED',
    attemptCount: batch.attemptCount + 1,
    workerId,
    claimedAt: now,
    availableAt: undefined,
  };
}

/** `true` when `workerId` currently holds the claim on `batch`. */
export function isHeldBy(batch: Batch, workerId: string): boolean {
  return batch.status === 'CLAIMED' && batch.workerId === workerId;
}

export function applyCompletion(batch: Batch, completion: BatchCompletion, now: number): Batch {
  return {
    ...batch,
    status: 'COMPLETED',
    outputRef: completion.outputRef,
    recordCount: completion.recordCount,
    workerId: undefined,
    claimedAt: undefined,
    completedAt: now,
  };
}

export function applyFailure(batch: Batch, failure: BatchFailure, now: number): Batch {
  const exhausted = failure.permanent || batch.attemptCount >= attemptLimit(batch);
  return {
    ...batch,
    status: exhausted ? 'FAILED' : 'PENDING',
    lastError: failure.error,
    workerId: undefined,
    claimedAt: undefined,
    availableAt: exhausted ? undefined : now + Math.max(0, failure.retryDelayMs),
    completedAt: exhausted ? now : undefined,
  };
}

/** `true` when `batch` is claimed and its claim started at or before `cutoff`. */
export function isStaleClaim(batch: Batch, cutoff: number): boolean {
  return batch.status === 'CLAIMED' && (batch.claimedAt ?? 0) <= cutoff;
}

/** Release an abandoned claim; the abandoned attempt still counts. */
export function applyReclaim(batch: Batch, now: number): Batch {
  const exhausted = batch.attemptCount >= attemptLimit(batch);
  return {
    ...batch,
    status: exhausted ? 'FAILED' : 'PENDING',
    lastError: `Claim by worker '${batch.workerId ?? 'unknown'}' expired`,
    workerId: undefined,
    claimedAt: undefined,
    availableAt: undefined,
    completedAt: exhausted ? now : undefined,
  };
}

export function countBatches(batches: Iterable<Batch>): BatchCounts {
  let total = 0;
  let pending = 0;
  let claimed = 0;
  let completed = 0;
  let failed = 0;

  for (const batch of batches) {
    total++;
    switch (batch.status) {
      case 'PENDING':
        pending++;
        break;
      case 'CLAIMED':
        claimed++;
        break;
      case 'COMPLETED':
        completed++;
        break;
      case 'FAILED':
        failed++;
        break;
    }
  }

  return { total, pending, claimed, completed, failed, settled: pending === 0 && claimed === 0 };
}
