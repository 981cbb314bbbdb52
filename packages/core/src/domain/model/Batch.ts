import type { BatchStatus } from './BatchStatus.js';

/** Persisted state of one slice of a job's input. */
export interface Batch {
  /** Unique within the job. */
  readonly id: string;
  readonly jobId: string;
  /** Zero-based position of the batch; defines merge order. */
  readonly index: number;
  readonly status: BatchStatus;
  /** Claims made so far. Never exceeds `maxRetries + 1`. */
  readonly attemptCount: number;
  readonly maxRetries: number;
  /** Location of this batch's targets in the `FragmentStore`. */
  readonly inputRef: string;
  readonly targetCount: number;
  /** Position of the batch's first target in the whole input. */
  readonly firstTargetIndex: number;
  /** Set on `COMPLETED`. */
  readonly outputRef?: string;
  /** Records written to `outputRef`. Set on `COMPLETED`. */
  readonly recordCount?: number;
  /** Message of the most recent failed attempt. */
  readonly lastError?: string;
  /** Holder of the current claim. Set only while `CLAIMED`. */
  readonly workerId?: string;
  readonly claimedAt?: number;
  /** Earliest time the batch may be claimed again after a failed attempt. */
  readonly availableAt?: number;
  readonly completedAt?: number;
}

/** What a worker reports when a batch succeeds. */
export interface BatchCompletion {
  readonly outputRef: string;
  readonly recordCount: number;
}

/** What a worker reports when a batch attempt fails. */
export interface BatchFailure {
  readonly error: string;
  /** Exhaust the batch now, whatever attempts remain. */
  readonly permanent: boolean;
  /** Backoff before the batch may be claimed again. */
  readonly retryDelayMs: number;
}

/** Aggregated batch statuses of one job. */
export interface BatchCounts {
  readonly total: number;
  readonly pending: number;
  readonly claimed: number;
  readonly completed: number;
  readonly failed: number;
  /** `true` when no batch is `PENDING` or `CLAIMED`. */
  readonly settled: boolean;
}

/** Build a fresh `PENDING` batch. */
export function createBatch(params: {
  readonly jobId: string;
  readonly index: number;
  readonly maxRetries: number;
  readonly inputRef: string;
  readonly targetCount: number;
  readonly firstTargetIndex: number;
}): Batch {
  return {
    id: batchIdFor(params.jobId, params.index),
    jobId: params.jobId,
    index: params.index,
    status: 'PENDING',
    attemptCount: 0,
    maxRetries: params.maxRetries,
    inputRef: params.inputRef,
    targetCount: params.targetCount,
    firstTargetIndex: params.firstTargetIndex,
  };
}

/** Deterministic batch id: stable across restarts and re-runs of the same input. */
export function batchIdFor(jobId: string, index: number): string {
  return `${jobId}:${String(index).padStart(6, '0')}`;
}
