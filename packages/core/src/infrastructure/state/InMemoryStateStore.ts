import type { StateStore } from '../../domain/ports/StateStore.js';
import type { Job, JobListFilter, JobTransitionPatch } from '../../domain/model/Job.js';
import type { JobStatus } from '../../domain/model/JobStatus.js';
import type { Batch, BatchCompletion, BatchCounts, BatchFailure } from '../../domain/model/Batch.js';
import type { ClaimBatchOptions, ClaimBatchResult } from '../../domain/model/BatchClaim.js';
import { ValidationError } from '../../domain/errors/PipelineErrors.js';
import { countBatches } from '../../domain/services/BatchLifecycle.js';
import type { DocumentUpdate, JobDocument } from './JobDocument.js';
import {
  archiveDocument,
  claimInDocument,
  completeInDocument,
  createDocument,
  failInDocument,
  reclaimInDocument,
  selectJobs,
  transitionDocument,
} from './JobDocument.js';

/**
 * Non-persistent state store. Data lives in memory and is lost when the
 * process exits. Suitable for tests and one-shot runs.
 *
 * Every operation runs synchronously between two awaits, which makes each
 * one atomic with respect to the others in the same process.
 */
export class InMemoryStateStore implements StateStore {
  private readonly documents = new Map<string, JobDocument>();

  createJob(job: Job, batches: readonly Batch[]): Promise<void> {
    if (this.documents.has(job.id)) {
      return Promise.reject(new ValidationError(`Job '${job.id}' already exists`));
    }
    try {
      this.documents.set(job.id, createDocument(job, batches));
      return Promise.resolve();
    } catch (error) {
      return Promise.reject(error instanceof Error ? error : new Error(String(error)));
    }
  }

  getJob(jobId: string): Promise<Job | null> {
    return Promise.resolve(this.documents.get(jobId)?.job ?? null);
  }

  listJobs(filter?: JobListFilter): Promise<readonly Job[]> {
    return Promise.resolve(selectJobs([...this.documents.values()].map((d) => d.job), filter));
  }

  transitionJob(jobId: string, from: readonly JobStatus[], to: JobStatus, patch?: JobTransitionPatch): Promise<boolean> {
    return this.update(jobId, false, (doc) => transitionDocument(doc, from, to, patch));
  }

  archiveJob(jobId: string): Promise<boolean> {
    return this.update(jobId, false, (doc) => archiveDocument(doc, Date.now()));
  }

  getBatches(jobId: string): Promise<readonly Batch[]> {
    return Promise.resolve(this.documents.get(jobId)?.batches ?? []);
  }

  getBatch(jobId: string, batchId: string): Promise<Batch | null> {
    return Promise.resolve(this.documents.get(jobId)?.batches.find((b) => b.id === batchId) ?? null);
  }

  claimBatch(jobId: string, workerId: string, options: ClaimBatchOptions = {}): Promise<ClaimBatchResult> {
    return this.update<ClaimBatchResult>(jobId, { claimed: false, reason: 'JOB_NOT_FOUND' }, (doc) =>
      claimInDocument(doc, workerId, options, Date.now()),
    );
  }

  completeBatch(jobId: string, batchId: string, workerId: string, completion: BatchCompletion): Promise<boolean> {
    return this.update(jobId, false, (doc) => completeInDocument(doc, batchId, workerId, completion, Date.now()));
  }

  failBatch(jobId: string, batchId: string, workerId: string, failure: BatchFailure): Promise<Batch | null> {
    return this.update<Batch | null>(jobId, null, (doc) => failInDocument(doc, batchId, workerId, failure, Date.now()));
  }

  reclaimStaleBatches(jobId: string, timeoutMs: number): Promise<number> {
    return this.update(jobId, 0, (doc) => reclaimInDocument(doc, timeoutMs, Date.now()));
  }

  getBatchCounts(jobId: string): Promise<BatchCounts> {
    return Promise.resolve(countBatches(this.documents.get(jobId)?.batches ?? []));
  }

  getCompletedBatchIds(jobId: string): Promise<readonly string[]> {
    const batches = this.documents.get(jobId)?.batches ?? [];
    return Promise.resolve(batches.filter((b) => b.status === 'COMPLETED').map((b) => b.id));
  }

  private update<T>(jobId: string, missing: T, operation: (doc: JobDocument) => DocumentUpdate<T>): Promise<T> {
    const current = this.documents.get(jobId);
    if (!current) {
      return Promise.resolve(missing);
    }
    try {
      const { document, result } = operation(current);
      if (document) {
        this.documents.set(jobId, document);
      }
      return Promise.resolve(result);
    } catch (error) {
      return Promise.reject(error instanceof Error ? error : new Error(String(error)));
    }
  }
}
