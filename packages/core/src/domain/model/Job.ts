import type { JobStatus } from './JobStatus.js';

/** Why a job ended in `FAILED`. */
export interface JobFailure {
  /** Error code of the failure (`PERMANENT`, `TRANSIENT`, `INTEGRITY`, ...). */
  readonly code: string;
  readonly message: string;
  /** Batch that caused the failure, when one did. */
  readonly batchId?: string;
  readonly batchIndex?: number;
}

/** Persisted state of a scrape job. Owned by the `StateStore`. */
export interface Job {
  readonly id: string;
  /** Opaque requester identity (e.g. an email address). */
  readonly owner?: string;
  readonly status: JobStatus;
  readonly createdAt: number;
  readonly startedAt?: number;
  readonly completedAt?: number;
  readonly totalBatches: number;
  readonly totalTargets: number;
  readonly batchSize: number;
  /** Retries allowed per batch after the first attempt. */
  readonly maxRetries: number;
  /** Location of the split input, as understood by the `FragmentStore`. */
  readonly inputRef: string;
  /** Location of the merged output. Set only once the job is `COMPLETED`. */
  readonly finalArtifactRef?: string;
  /** Set only once the job is `FAILED`. */
  readonly failure?: JobFailure;
  readonly archivedAt?: number;
  /** Caller-supplied data carried with the job, never interpreted. */
  readonly metadata?: Readonly<Record<string, unknown>>;
  /** Id of the job this one re-runs. */
  readonly rerunOf?: string;
}

/** Fields a status transition may set alongside the new status. */
export interface JobTransitionPatch {
  readonly startedAt?: number;
  readonly completedAt?: number;
  readonly finalArtifactRef?: string;
  readonly failure?: JobFailure;
}

/** Batch-level progress of a job. */
export interface JobProgress {
  readonly totalBatches: number;
  readonly completedBatches: number;
  readonly failedBatches: number;
  readonly pendingBatches: number;
  readonly claimedBatches: number;
  readonly totalTargets: number;
  /** Targets in completed batches. */
  readonly completedTargets: number;
  /** Records produced by completed batches. */
  readonly extractedRecords: number;
  /** Percentage of batches completed, rounded. */
  readonly percentage: number;
  readonly elapsedMs: number;
}

/** Filter for listing jobs. Jobs are returned newest first. */
export interface JobListFilter {
  readonly status?: JobStatus | readonly JobStatus[];
  readonly owner?: string;
  /** Include archived jobs. Default: `false`. */
  readonly includeArchived?: boolean;
  readonly limit?: number;
}

const JOB_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Job ids name files and fragment locations, so they are limited to letters,
 * digits, `.`, `_` and `-`, and may not be `.` or `..`.
 */
export function isValidJobId(jobId: string): boolean {
  return JOB_ID_PATTERN.test(jobId) && jobId !== '.' && jobId !== '..';
}
