import { hostname } from 'node:os';
import { join } from 'node:path';
import type { Job, JobListFilter } from './domain/model/Job.js';
import { isTerminalStatus } from './domain/model/JobStatus.js';
import type { ExtractedRecord, Target } from './domain/model/Target.js';
import type { StateStore } from './domain/ports/StateStore.js';
import type { FragmentStore } from './domain/ports/FragmentStore.js';
import type { TaskQueue } from './domain/ports/TaskQueue.js';
import type { ExtractionService } from './domain/ports/ExtractionService.js';
import type { JobNotifier } from './domain/ports/JobNotifier.js';
import type { Logger } from './domain/ports/Logger.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { TargetParser } from './domain/ports/TargetParser.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { InvalidJobStateError, JobNotFoundError } from './domain/errors/PipelineErrors.js';
import { RetryPolicy } from './domain/services/RetryPolicy.js';
import type { PipelineConfig } from './config/PipelineConfig.js';
import { parsePipelineConfig } from './config/PipelineConfig.js';
import { EventBus } from './application/EventBus.js';
import { PipelineContext } from './application/PipelineContext.js';
import { WorkerPool } from './application/WorkerPool.js';
import { SubmitJob } from './application/usecases/SubmitJob.js';
import type { SubmitJobOptions, SubmitJobResult } from './application/usecases/SubmitJob.js';
import { ResumeJob } from './application/usecases/ResumeJob.js';
import type { ResumeResult } from './application/usecases/ResumeJob.js';
import { ProcessBatchTask } from './application/usecases/ProcessBatchTask.js';
import { MergeJobResults } from './application/usecases/MergeJobResults.js';
import { CancelJob } from './application/usecases/CancelJob.js';
import { RerunJob } from './application/usecases/RerunJob.js';
import type { RerunResult } from './application/usecases/RerunJob.js';
import { GetJobStatus } from './application/usecases/GetJobStatus.js';
import type { JobStatusResult } from './application/usecases/GetJobStatus.js';
import { InMemoryStateStore } from './infrastructure/state/InMemoryStateStore.js';
import { FileStateStore } from './infrastructure/state/FileStateStore.js';
import { InMemoryFragmentStore } from './infrastructure/fragments/InMemoryFragmentStore.js';
import { FileFragmentStore } from './infrastructure/fragments/FileFragmentStore.js';
import { InMemoryTaskQueue } from './infrastructure/queue/InMemoryTaskQueue.js';
import { ConsoleLogger } from './infrastructure/logging/ConsoleLogger.js';
import { WebhookNotifier } from './infrastructure/notifications/WebhookNotifier.js';

/** Configuration for a pipeline. */
export interface ScrapePipelineOptions {
  /** The external operation that turns a batch of targets into records. */
  readonly extraction: ExtractionService;
  /** Persistence for jobs and batches. Default: `InMemoryStateStore`. */
  readonly stateStore?: StateStore;
  /** Storage for input slices, outputs and merged artifacts. Default: `InMemoryFragmentStore`. */
  readonly fragments?: FragmentStore;
  /** Default: `InMemoryTaskQueue`. */
  readonly queue?: TaskQueue;
  /** Default: `ConsoleLogger` at level `info`. */
  readonly logger?: Logger;
  /** Told when a job completes or fails. Default: none. */
  readonly notifier?: JobNotifier;
  /** Targets per batch. Default: `10000`. */
  readonly batchSize?: number;
  /** Retries per batch after its first attempt. Default: `2`. */
  readonly maxRetries?: number;
  /** Workers started by `start()`. Default: `4`. */
  readonly concurrency?: number;
  /** Backoff after a batch's first failed attempt, growing linearly. Default: `10000`. */
  readonly retryBaseDelayMs?: number;
  /** Default: `300000`. */
  readonly retryMaxDelayMs?: number;
  /** Per-call extraction timeout, `0` to disable. Default: `300000`. */
  readonly extractionTimeoutMs?: number;
  /** Claims older than this are released on resume. Default: `900000`. */
  readonly staleClaimTimeoutMs?: number;
  /** Prefix of worker ids. Default: `{hostname}-{pid}`. */
  readonly workerIdPrefix?: string;
}

/** Collaborators `fromConfig()` cannot derive from configuration. */
export interface ScrapePipelineDeps {
  readonly extraction: ExtractionService;
  /** Replaces the file-backed state store, e.g. with a `SequelizeStateStore`. */
  readonly stateStore?: StateStore;
  /** Used by the webhook notifier. */
  readonly fetchFn?: typeof fetch;
}

export interface WaitForJobOptions {
  /** Reject after this long. Default: wait indefinitely. */
  readonly timeoutMs?: number;
}

/**
 * Facade over the resumable batch pipeline: split → persist → queue →
 * extract (with retries) → merge.
 *
 * Delegates each operation to a dedicated use case in `application/usecases/`.
 * All job state lives in the `StateStore`; the queue is rebuilt from it by
 * `resume()`, which is also how a submitted job is started.
 *
 * @example
 * ```typescript
 * const pipeline = new ScrapePipeline({ extraction: new HttpExtractionService({ endpoint }) });
 * const { jobId } = await pipeline.submitFrom(new FilePathSource('targets.txt'), new LineParser());
 * pipeline.start();
 * await pipeline.resume(jobId);
 * const job = await pipeline.waitForJob(jobId);
 * ```
 */
export class ScrapePipeline {
  private readonly ctx: PipelineContext;
  private readonly pool: WorkerPool;
  private readonly merger: MergeJobResults;
  private readonly processTask: ProcessBatchTask;

  constructor(options: ScrapePipelineOptions) {
    const config = parsePipelineConfig({
      batchSize: options.batchSize,
      maxRetries: options.maxRetries,
      concurrency: options.concurrency,
      retryBaseDelayMs: options.retryBaseDelayMs,
      retryMaxDelayMs: options.retryMaxDelayMs,
      extractionTimeoutMs: options.extractionTimeoutMs,
      staleClaimTimeoutMs: options.staleClaimTimeoutMs,
    });
    const logger = options.logger ?? new ConsoleLogger({ level: config.logLevel, format: config.logFormat });

    this.ctx = new PipelineContext({
      stateStore: options.stateStore ?? new InMemoryStateStore(),
      fragments: options.fragments ?? new InMemoryFragmentStore(),
      queue: options.queue ?? new InMemoryTaskQueue(),
      extraction: options.extraction,
      eventBus: new EventBus(logger.child('events')),
      logger,
      retryPolicy: new RetryPolicy({ baseDelayMs: config.retryBaseDelayMs, maxDelayMs: config.retryMaxDelayMs }),
      notifier: options.notifier ?? null,
      settings: {
        batchSize: config.batchSize,
        maxRetries: config.maxRetries,
        extractionTimeoutMs: config.extractionTimeoutMs,
        staleClaimTimeoutMs: config.staleClaimTimeoutMs,
      },
    });
    this.merger = new MergeJobResults(this.ctx);
    this.processTask = new ProcessBatchTask(this.ctx, this.merger);
    this.pool = new WorkerPool(
      this.ctx,
      this.processTask,
      config.concurrency,
      options.workerIdPrefix ?? `${hostname()}-${String(process.pid)}`,
    );
  }

  /**
   * Build a pipeline from validated configuration: file-backed state and
   * fragments under `dataDir`, a console logger, and a webhook notifier when
   * `webhookUrl` is set.
   */
  static fromConfig(config: PipelineConfig, deps: ScrapePipelineDeps): ScrapePipeline {
    return new ScrapePipeline({
      extraction: deps.extraction,
      stateStore: deps.stateStore ?? new FileStateStore({ directory: join(config.dataDir, 'state') }),
      fragments: new FileFragmentStore({ directory: join(config.dataDir, 'jobs') }),
      logger: new ConsoleLogger({ level: config.logLevel, format: config.logFormat }),
      notifier: config.webhookUrl ? new WebhookNotifier({ url: config.webhookUrl, fetchFn: deps.fetchFn }) : undefined,
      batchSize: config.batchSize,
      maxRetries: config.maxRetries,
      concurrency: config.concurrency,
      retryBaseDelayMs: config.retryBaseDelayMs,
      retryMaxDelayMs: config.retryMaxDelayMs,
      extractionTimeoutMs: config.extractionTimeoutMs,
      staleClaimTimeoutMs: config.staleClaimTimeoutMs,
    });
  }

  /**
   * Split `targets` into batches and persist a new `PENDING` job.
   *
   * @throws ValidationError when the input is empty or unreadable, or the options are invalid.
   */
  async submit(targets: AsyncIterable<Target> | Iterable<Target>, options?: SubmitJobOptions): Promise<SubmitJobResult> {
    return new SubmitJob(this.ctx).execute(targets, options);
  }

  /** Like `submit()`, reading targets from `source` through `parser`. */
  async submitFrom(source: DataSource, parser: TargetParser, options?: SubmitJobOptions): Promise<SubmitJobResult> {
    return this.submit(parser.parse(source.read()), options);
  }

  /** Start the worker pool. Tasks are processed as soon as they are queued. */
  start(): void {
    this.pool.start();
  }

  /**
   * Stop the workers (waiting for attempts in progress) and close the queue.
   * Queued tasks are discarded; `resume()` in a new pipeline recovers them.
   */
  async stop(): Promise<void> {
    await this.pool.stop();
    this.ctx.queue.close();
  }

  /** Start or re-drive a job from its persisted state. Idempotent. */
  async resume(jobId: string): Promise<ResumeResult> {
    return new ResumeJob(this.ctx, this.merger).execute(jobId);
  }

  /** Resume every job that is `PENDING` or `RUNNING`, e.g. at process start. */
  async resumeAll(): Promise<readonly ResumeResult[]> {
    const jobs = await this.ctx.stateStore.listJobs({ status: ['PENDING', 'RUNNING'], includeArchived: true });
    const results: ResumeResult[] = [];
    for (const job of [...jobs].reverse()) {
      results.push(await this.resume(job.id));
    }
    return results;
  }

  /** Cancel a `PENDING` or `RUNNING` job. */
  async cancel(jobId: string): Promise<Job> {
    return new CancelJob(this.ctx).execute(jobId);
  }

  /** Create a new job that re-runs the unfinished part of a failed or cancelled one. */
  async rerun(jobId: string): Promise<RerunResult> {
    return new RerunJob(this.ctx).execute(jobId);
  }

  async getJob(jobId: string): Promise<Job | null> {
    return this.ctx.stateStore.getJob(jobId);
  }

  async getStatus(jobId: string): Promise<JobStatusResult> {
    return new GetJobStatus(this.ctx).execute(jobId);
  }

  async listJobs(filter?: JobListFilter): Promise<readonly Job[]> {
    return this.ctx.stateStore.listJobs(filter);
  }

  /** Hide a terminal job from `listJobs()` unless archived jobs are requested. */
  async archive(jobId: string): Promise<boolean> {
    return this.ctx.stateStore.archiveJob(jobId);
  }

  /** Resolve with the job once it is terminal. */
  async waitForJob(jobId: string, options: WaitForJobOptions = {}): Promise<Job> {
    let release: () => void = () => undefined;
    const settled = new Promise<void>((resolve) => {
      const listener = (event: DomainEvent): void => {
        if (event.jobId !== jobId) return;
        if (event.type === 'job:completed' || event.type === 'job:failed' || event.type === 'job:cancelled') {
          resolve();
        }
      };
      this.ctx.eventBus.onAny(listener);
      release = () => {
        this.ctx.eventBus.offAny(listener);
      };
    });

    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      const current = await this.ctx.stateStore.getJob(jobId);
      if (!current) throw new JobNotFoundError(jobId);
      if (isTerminalStatus(current.status)) return current;

      const waits: Promise<void>[] = [settled];
      if (options.timeoutMs !== undefined) {
        const timeoutMs = options.timeoutMs;
        waits.push(
          new Promise<void>((_resolve, reject) => {
            timer = setTimeout(() => {
              reject(new InvalidJobStateError(`Job '${jobId}' did not finish within ${String(timeoutMs)}ms`));
            }, timeoutMs);
          }),
        );
      }
      await Promise.race(waits);

      const finished = await this.ctx.stateStore.getJob(jobId);
      if (!finished) throw new JobNotFoundError(jobId);
      return finished;
    } finally {
      clearTimeout(timer);
      release();
    }
  }

  /** Stream the merged records of a `COMPLETED` job, in input order. */
  async *readResults(jobId: string): AsyncIterable<ExtractedRecord> {
    const job = await this.ctx.stateStore.getJob(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    if (job.status !== 'COMPLETED' || job.finalArtifactRef === undefined) {
      throw new InvalidJobStateError(`Job '${jobId}' has no results (status ${job.status})`);
    }
    yield* this.ctx.fragments.readArtifact(job.finalArtifactRef);
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }
}
