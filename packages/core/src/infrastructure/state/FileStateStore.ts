import { readFile, readdir } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import type { StateStore } from '../../domain/ports/StateStore.js';
import type { Job, JobListFilter, JobTransitionPatch } from '../../domain/model/Job.js';
import type { JobStatus } from '../../domain/model/JobStatus.js';
import type { Batch, BatchCompletion, BatchCounts, BatchFailure } from '../../domain/model/Batch.js';
import type { ClaimBatchOptions, ClaimBatchResult } from '../../domain/model/BatchClaim.js';
import { IntegrityError, ValidationError, toErrorMessage } from '../../domain/errors/PipelineErrors.js';
import { countBatches } from '../../domain/services/BatchLifecycle.js';
import { isMissingFile, writeFileAtomic } from '../fs/atomicWrite.js';
import { JobDocumentSchema } from './documentSchema.js';
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

export interface FileStateStoreOptions {
  /** Directory where job files are stored. Default: `'.scrapeflow/state'`. */
  readonly directory?: string;
}

/**
 * File-based state store that keeps each job, with its batches, in one JSON
 * file: `{directory}/{jobId}.json`.
 *
 * Files are replaced atomically (write to a temp file, then rename), so a
 * crash never leaves a half-written job behind. Operations on the same job
 * are serialised within the process; the store is not safe to share between
 * processes. Use `SequelizeStateStore` for that.
 *
 * Node.js only.
 */
export class FileStateStore implements StateStore {
  private readonly directory: string;
  private readonly locks = new Map<string, Promise<unknown>>();

  constructor(options?: FileStateStoreOptions) {
    this.directory = options?.directory ?? join('.scrapeflow', 'state');
  }

  async createJob(job: Job, batches: readonly Batch[]): Promise<void> {
    await this.serialize(job.id, async () => {
      if (await this.load(job.id)) {
        throw new ValidationError(`Job '${job.id}' already exists`);
      }
      await this.persist(createDocument(job, batches));
    });
  }

  async getJob(jobId: string): Promise<Job | null> {
    const document = await this.load(jobId);
    return document?.job ?? null;
  }

  async listJobs(filter?: JobListFilter): Promise<readonly Job[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const jobs: Job[] = [];
    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue;
      const document = await this.load(entry.slice(0, -'.json'.length));
      if (document) jobs.push(document.job);
    }
    return selectJobs(jobs, filter);
  }

  transitionJob(jobId: string, from: readonly JobStatus[], to: JobStatus, patch?: JobTransitionPatch): Promise<boolean> {
    return this.update(jobId, false, (doc) => transitionDocument(doc, from, to, patch));
  }

  archiveJob(jobId: string): Promise<boolean> {
    return this.update(jobId, false, (doc) => archiveDocument(doc, Date.now()));
  }

  async getBatches(jobId: string): Promise<readonly Batch[]> {
    const document = await this.load(jobId);
    return document?.batches ?? [];
  }

  async getBatch(jobId: string, batchId: string): Promise<Batch | null> {
    const batches = await this.getBatches(jobId);
    return batches.find((b) => b.id === batchId) ?? null;
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

  async getBatchCounts(jobId: string): Promise<BatchCounts> {
    return countBatches(await this.getBatches(jobId));
  }

  async getCompletedBatchIds(jobId: string): Promise<readonly string[]> {
    const batches = await this.getBatches(jobId);
    return batches.filter((b) => b.status === 'COMPLETED').map((b) => b.id);
  }

  private update<T>(jobId: string, missing: T, operation: (doc: JobDocument) => DocumentUpdate<T>): Promise<T> {
    return this.serialize(jobId, async () => {
      const current = await this.load(jobId);
      if (!current) return missing;
      const { document, result } = operation(current);
      if (document) {
        await this.persist(document);
      }
      return result;
    });
  }

  /** Run `task` after every earlier task on the same job has settled. */
  private serialize<T>(jobId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(jobId) ?? Promise.resolve();
    const run = previous.then(task, task);
    // The chain only orders tasks; failures reach the caller through `run`.
    this.locks.set(
      jobId,
      run.catch(() => undefined),
    );
    return run;
  }

  private async load(jobId: string): Promise<JobDocument | null> {
    let content: string;
    try {
      content = await readFile(this.jobFilePath(jobId), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    try {
      return JobDocumentSchema.parse(JSON.parse(content));
    } catch (error) {
      throw new IntegrityError(`State file of job '${jobId}' is unreadable: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async persist(document: JobDocument): Promise<void> {
    await writeFileAtomic(this.jobFilePath(document.job.id), JSON.stringify(document, null, 2));
  }

  private jobFilePath(jobId: string): string {
    const root = resolve(this.directory);
    const path = resolve(root, `${jobId}.json`);
    if (dirname(path) !== root) {
      throw new ValidationError(`Job id '${jobId}' does not name a file in the state directory`);
    }
    return path;
  }
}
