import type { Job, JobProgress } from '../domain/model/Job.js';
import type { Batch } from '../domain/model/Batch.js';
import type { StateStore } from '../domain/ports/StateStore.js';
import type { FragmentStore } from '../domain/ports/FragmentStore.js';
import type { TaskQueue } from '../domain/ports/TaskQueue.js';
import type { ExtractionService } from '../domain/ports/ExtractionService.js';
import type { JobNotifier } from '../domain/ports/JobNotifier.js';
import type { Logger } from '../domain/ports/Logger.js';
import type { RetryPolicy } from '../domain/services/RetryPolicy.js';
import { countBatches } from '../domain/services/BatchLifecycle.js';
import type { EventBus } from './EventBus.js';

/** Tunables the use cases read. */
export interface PipelineSettings {
  readonly batchSize: number;
  readonly maxRetries: number;
  /** 0 disables the per-call timeout. */
  readonly extractionTimeoutMs: number;
  readonly staleClaimTimeoutMs: number;
}

export interface PipelineContextDeps {
  readonly stateStore: StateStore;
  readonly fragments: FragmentStore;
  readonly queue: TaskQueue;
  readonly extraction: ExtractionService;
  readonly eventBus: EventBus;
  readonly logger: Logger;
  readonly retryPolicy: RetryPolicy;
  readonly notifier: JobNotifier | null;
  readonly settings: PipelineSettings;
}

/**
 * Collaborators shared by every use case of one pipeline.
 *
 * Unlike the records it points to, the context holds no job state: all of it
 * lives in the `StateStore`, so any number of pipelines (in this process or
 * others) can drive the same jobs.
 */
export class PipelineContext {
  readonly stateStore: StateStore;
  readonly fragments: FragmentStore;
  readonly queue: TaskQueue;
  readonly extraction: ExtractionService;
  readonly eventBus: EventBus;
  readonly logger: Logger;
  readonly retryPolicy: RetryPolicy;
  readonly notifier: JobNotifier | null;
  readonly settings: PipelineSettings;

  constructor(deps: PipelineContextDeps) {
    this.stateStore = deps.stateStore;
    this.fragments = deps.fragments;
    this.queue = deps.queue;
    this.extraction = deps.extraction;
    this.eventBus = deps.eventBus;
    this.logger = deps.logger;
    this.retryPolicy = deps.retryPolicy;
    this.notifier = deps.notifier;
    this.settings = deps.settings;
  }

  /** Put a batch on the queue, held back by `delayMs`. */
  async enqueueBatch(batch: Batch, delayMs = 0): Promise<void> {
    await this.queue.enqueue(
      { jobId: batch.jobId, batchId: batch.id, batchIndex: batch.index, enqueuedAt: Date.now() },
      { delayMs },
    );
  }

  /** Hand a finished job to the notifier. Delivery failures are logged, never thrown. */
  async notify(jobId: string): Promise<void> {
    if (!this.notifier) return;
    const job = await this.stateStore.getJob(jobId);
    if (!job) return;
    try {
      await this.notifier.notify(job);
    } catch (error) {
      this.logger.warn('Job notification failed', { jobId, status: job.status, error });
    }
  }

  buildProgress(job: Job, batches: readonly Batch[]): JobProgress {
    const counts = countBatches(batches);
    let completedTargets = 0;
    let extractedRecords = 0;
    for (const batch of batches) {
      if (batch.status !== 'COMPLETED') continue;
      completedTargets += batch.targetCount;
      extractedRecords += batch.recordCount ?? 0;
    }
    const end = job.completedAt ?? Date.now();

    return {
      totalBatches: counts.total,
      completedBatches: counts.completed,
      failedBatches: counts.failed,
      pendingBatches: counts.pending,
      claimedBatches: counts.claimed,
      totalTargets: job.totalTargets,
      completedTargets,
      extractedRecords,
      percentage: counts.total > 0 ? Math.round((counts.completed / counts.total) * 100) : 0,
      elapsedMs: job.startedAt !== undefined ? Math.max(0, end - job.startedAt) : 0,
    };
  }
}
