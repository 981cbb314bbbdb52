import type { JobFailure, JobProgress } from '../model/Job.js';
import type { ClaimBatchFailureReason } from '../model/BatchClaim.js';

/** Emitted once the input is split and the job and its batches are persisted. */
export interface JobSubmittedEvent {
  readonly type: 'job:submitted';
  readonly jobId: string;
  readonly totalTargets: number;
  readonly totalBatches: number;
  readonly timestamp: number;
}

/** Emitted when a job moves from `PENDING` to `RUNNING`. */
export interface JobStartedEvent {
  readonly type: 'job:started';
  readonly jobId: string;
  readonly totalBatches: number;
  readonly timestamp: number;
}

/** Emitted after each completed batch with updated progress counters. */
export interface JobProgressEvent {
  readonly type: 'job:progress';
  readonly jobId: string;
  readonly progress: JobProgress;
  readonly timestamp: number;
}

/** Emitted when the merged artifact is written and the job is `COMPLETED`. */
export interface JobCompletedEvent {
  readonly type: 'job:completed';
  readonly jobId: string;
  readonly finalArtifactRef: string;
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Emitted when the job fails: an exhausted batch, or a fragment that failed its integrity check. */
export interface JobFailedEvent {
  readonly type: 'job:failed';
  readonly jobId: string;
  readonly failure: JobFailure;
  readonly timestamp: number;
}

/** Emitted when an operator cancels the job. */
export interface JobCancelledEvent {
  readonly type: 'job:cancelled';
  readonly jobId: string;
  /** Queued tasks removed from the queue. */
  readonly droppedTasks: number;
  readonly timestamp: number;
}

/** Emitted when a worker claims a batch. */
export interface BatchClaimedEvent {
  readonly type: 'batch:claimed';
  readonly jobId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly workerId: string;
  /** 1-based attempt number of this claim. */
  readonly attempt: number;
  readonly timestamp: number;
}

/** Emitted when a batch's output fragment is stored and the batch is `COMPLETED`. */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly jobId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly recordCount: number;
  readonly attempt: number;
  readonly timestamp: number;
}

/** Emitted when a failed attempt leaves the batch eligible for another claim. */
export interface BatchRetryingEvent {
  readonly type: 'batch:retrying';
  readonly jobId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  /** Attempt that just failed. */
  readonly attempt: number;
  readonly maxRetries: number;
  readonly delayMs: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a batch is exhausted and becomes terminally `FAILED`. */
export interface BatchFailedEvent {
  readonly type: 'batch:failed';
  readonly jobId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly attempt: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a dequeued task could not claim its batch and was dropped. */
export interface BatchSkippedEvent {
  readonly type: 'batch:skipped';
  readonly jobId: string;
  readonly batchId: string;
  readonly reason: ClaimBatchFailureReason;
  readonly timestamp: number;
}

/** Emitted when the merge passes over a batch whose output holds no records. */
export interface MergeFragmentSkippedEvent {
  readonly type: 'merge:fragment-skipped';
  readonly jobId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | JobSubmittedEvent
  | JobStartedEvent
  | JobProgressEvent
  | JobCompletedEvent
  | JobFailedEvent
  | JobCancelledEvent
  | BatchClaimedEvent
  | BatchCompletedEvent
  | BatchRetryingEvent
  | BatchFailedEvent
  | BatchSkippedEvent
  | MergeFragmentSkippedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
