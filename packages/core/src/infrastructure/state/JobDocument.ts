import type { Job, JobListFilter, JobTransitionPatch } from '../../domain/model/Job.js';
import type { JobStatus } from '../../domain/model/JobStatus.js';
import { canTransition, isTerminalStatus } from '../../domain/model/JobStatus.js';
import type { Batch, BatchCompletion, BatchFailure } from '../../domain/model/Batch.js';
import type { ClaimBatchOptions, ClaimBatchResult } from '../../domain/model/BatchClaim.js';
import { InvalidJobStateError, ValidationError } from '../../domain/errors/PipelineErrors.js';
import {
  applyClaim,
  applyCompletion,
  applyFailure,
  applyReclaim,
  claimRejection,
  isHeldBy,
  isStaleClaim,
} from '../../domain/services/BatchLifecycle.js';

/** A job together with its batches (ascending by index): the unit the in-process stores keep. */
export interface JobDocument {
  readonly job: Job;
  readonly batches: readonly Batch[];
}

/** Outcome of an operation on a document. `document` is set only when something changed. */
export interface DocumentUpdate<T> {
  readonly document?: JobDocument;
  readonly result: T;
}

export function createDocument(job: Job, batches: readonly Batch[]): JobDocument {
  const indices = new Set<number>();
  const ids = new Set<string>();
  for (const batch of batches) {
    if (batch.jobId !== job.id) {
      throw new ValidationError(`Batch '${batch.id}' does not belong to job '${job.id}'`);
    }
    if (indices.has(batch.index) || ids.has(batch.id)) {
      throw new ValidationError(`Duplicate batch ${String(batch.index)} in job '${job.id}'`);
    }
    indices.add(batch.index);
    ids.add(batch.id);
  }
  return { job, batches: [...batches].sort((a, b) => a.index - b.index) };
}

export function transitionDocument(
  document: JobDocument,
  from: readonly JobStatus[],
  to: JobStatus,
  patch: JobTransitionPatch = {},
): DocumentUpdate<boolean> {
  for (const status of from) {
    if (!canTransition(status, to)) {
      throw new InvalidJobStateError(`Invalid job transition: ${status} → ${to}`);
    }
  }
  if (!from.includes(document.job.status)) {
    return { result: false };
  }
  return { document: { ...document, job: { ...document.job, ...patch, status: to } }, result: true };
}

export function archiveDocument(document: JobDocument, now: number): DocumentUpdate<boolean> {
  if (!isTerminalStatus(document.job.status)) {
    return { result: false };
  }
  if (document.job.archivedAt !== undefined) {
    return { result: true };
  }
  return { document: { ...document, job: { ...document.job, archivedAt: now } }, result: true };
}

export function claimInDocument(
  document: JobDocument,
  workerId: string,
  options: ClaimBatchOptions,
  now: number,
): DocumentUpdate<ClaimBatchResult> {
  if (document.job.status !== 'RUNNING') {
    return { result: { claimed: false, reason: 'JOB_NOT_RUNNING' } };
  }

  let position: number;
  if (options.batchId !== undefined) {
    position = document.batches.findIndex((b) => b.id === options.batchId);
    if (position === -1) {
      return { result: { claimed: false, reason: 'BATCH_NOT_FOUND' } };
    }
  } else {
    position = document.batches.findIndex((b) => claimRejection(b, now) === null);
    if (position === -1) {
      return { result: { claimed: false, reason: 'NO_PENDING_BATCHES' } };
    }
  }

  const current = document.batches[position];
  if (!current) {
    return { result: { claimed: false, reason: 'BATCH_NOT_FOUND' } };
  }
  const rejection = claimRejection(current, now);
  if (rejection) {
    return { result: rejection };
  }

  const claimed = applyClaim(current, workerId, now);
  return { document: replaceBatch(document, position, claimed), result: { claimed: true, batch: claimed } };
}

export function completeInDocument(
  document: JobDocument,
  batchId: string,
  workerId: string,
  completion: BatchCompletion,
  now: number,
): DocumentUpdate<boolean> {
  const position = document.batches.findIndex((b) => b.id === batchId);
  const current = document.batches[position];
  if (!current || !isHeldBy(current, workerId)) {
    return { result: false };
  }
  return { document: replaceBatch(document, position, applyCompletion(current, completion, now)), result: true };
}

export function failInDocument(
  document: JobDocument,
  batchId: string,
  workerId: string,
  failure: BatchFailure,
  now: number,
): DocumentUpdate<Batch | null> {
  const position = document.batches.findIndex((b) => b.id === batchId);
  const current = document.batches[position];
  if (!current || !isHeldBy(current, workerId)) {
    return { result: null };
  }
  const failed = applyFailure(current, failure, now);
  return { document: replaceBatch(document, position, failed), result: failed };
}

export function reclaimInDocument(document: JobDocument, timeoutMs: number, now: number): DocumentUpdate<number> {
  const cutoff = now - timeoutMs;
  let reclaimed = 0;
  const batches = document.batches.map((batch) => {
    if (!isStaleClaim(batch, cutoff)) return batch;
    reclaimed++;
    return applyReclaim(batch, now);
  });
  if (reclaimed === 0) {
    return { result: 0 };
  }
  return { document: { ...document, batches }, result: reclaimed };
}

export function matchesFilter(job: Job, filter: JobListFilter): boolean {
  if (filter.status !== undefined) {
    const statuses: readonly JobStatus[] = typeof filter.status === 'string' ? [filter.status] : filter.status;
    if (!statuses.includes(job.status)) return false;
  }
  if (filter.owner !== undefined && job.owner !== filter.owner) return false;
  if (!filter.includeArchived && job.archivedAt !== undefined) return false;
  return true;
}

/** Apply a list filter to jobs in any order: newest first, then `limit`. */
export function selectJobs(jobs: Iterable<Job>, filter: JobListFilter = {}): readonly Job[] {
  const selected = [...jobs]
    .filter((job) => matchesFilter(job, filter))
    .sort((a, b) => b.createdAt - a.createdAt || b.id.localeCompare(a.id));
  return filter.limit !== undefined ? selected.slice(0, Math.max(0, filter.limit)) : selected;
}

function replaceBatch(document: JobDocument, position: number, batch: Batch): JobDocument {
  const batches = [...document.batches];
  batches[position] = batch;
  return { ...document, batches };
}
