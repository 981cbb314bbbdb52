import { randomUUID } from 'node:crypto';
import type { PipelineContext } from '../PipelineContext.js';
import type { Job } from '../../domain/model/Job.js';
import { isValidJobId } from '../../domain/model/Job.js';
import type { Batch } from '../../domain/model/Batch.js';
import type { Target } from '../../domain/model/Target.js';
import { createBatch } from '../../domain/model/Batch.js';
import { BatchSplitter } from '../../domain/services/BatchSplitter.js';
import { ValidationError, toErrorMessage } from '../../domain/errors/PipelineErrors.js';

export interface SubmitJobOptions {
  /** Default: the pipeline's `batchSize`. */
  readonly batchSize?: number;
  /** Default: the pipeline's `maxRetries`. */
  readonly maxRetries?: number;
  readonly owner?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
  /** Use this id instead of a generated one. Letters, digits, `.`, `_` and `-` only. */
  readonly jobId?: string;
}

/** Position and size of one batch created by a submission. */
export interface BatchDescriptor {
  readonly batchId: string;
  readonly index: number;
  readonly targetCount: number;
  readonly firstTargetIndex: number;
  readonly inputRef: string;
}

export interface SubmitJobResult {
  readonly jobId: string;
  readonly totalTargets: number;
  readonly totalBatches: number;
  readonly batches: readonly BatchDescriptor[];
}

/**
 * Use case: split an input into batches and persist the job.
 *
 * Each batch's targets are written to the fragment store as the splitter
 * yields them, so the input is streamed rather than loaded. The job and all
 * of its batches are then created in one store call; until that succeeds the
 * job does not exist. Fragments are tagged with an id of their own per
 * submission, so a rejected submission removes what it wrote and nothing
 * else, even when another submission raced it for the same job id.
 *
 * The job is left `PENDING`. `ResumeJob` starts it.
 */
export class SubmitJob {
  constructor(private readonly ctx: PipelineContext) {}

  async execute(targets: AsyncIterable<Target> | Iterable<Target>, options: SubmitJobOptions = {}): Promise<SubmitJobResult> {
    const batchSize = options.batchSize ?? this.ctx.settings.batchSize;
    const maxRetries = options.maxRetries ?? this.ctx.settings.maxRetries;
    const jobId = options.jobId ?? randomUUID();
    this.validateOptions(jobId, batchSize, maxRetries);

    if (await this.ctx.stateStore.getJob(jobId)) {
      throw new ValidationError(`Job '${jobId}' already exists`);
    }

    const logger = this.ctx.logger.child('submit');
    const submissionId = randomUUID();
    const written: string[] = [];
    const batches: Batch[] = [];
    let totalTargets = 0;

    try {
      const splitter = new BatchSplitter(batchSize);
      for await (const group of splitter.split(readableInput(targets))) {
        const inputRef = await this.ctx.fragments.writeInput(jobId, submissionId, group.batchIndex, group.targets);
        written.push(inputRef);
        batches.push(
          createBatch({
            jobId,
            index: group.batchIndex,
            maxRetries,
            inputRef,
            targetCount: group.targets.length,
            firstTargetIndex: group.firstTargetIndex,
          }),
        );
        totalTargets += group.targets.length;
      }

      if (batches.length === 0) {
        throw new ValidationError('Input contains no targets');
      }

      const job: Job = {
        id: jobId,
        owner: options.owner,
        status: 'PENDING',
        createdAt: Date.now(),
        totalBatches: batches.length,
        totalTargets,
        batchSize,
        maxRetries,
        inputRef: this.ctx.fragments.inputLocation(jobId),
        metadata: options.metadata,
      };
      await this.ctx.stateStore.createJob(job, batches);
    } catch (error) {
      await this.ctx.fragments.removeFragments(written);
      logger.warn('Submission rejected', { jobId, error });
      throw error;
    }

    logger.info('Job submitted', { jobId, totalTargets, totalBatches: batches.length, batchSize });
    this.ctx.eventBus.emit({
      type: 'job:submitted',
      jobId,
      totalTargets,
      totalBatches: batches.length,
      timestamp: Date.now(),
    });

    return {
      jobId,
      totalTargets,
      totalBatches: batches.length,
      batches: batches.map((b) => ({
        batchId: b.id,
        index: b.index,
        targetCount: b.targetCount,
        firstTargetIndex: b.firstTargetIndex,
        inputRef: b.inputRef,
      })),
    };
  }

  private validateOptions(jobId: string, batchSize: number, maxRetries: number): void {
    const issues: string[] = [];
    if (!isValidJobId(jobId)) {
      issues.push(`jobId: must be 1-128 letters, digits, '.', '_' or '-' and not '.' or '..', got '${jobId}'`);
    }
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      issues.push(`batchSize: must be a positive integer, got ${String(batchSize)}`);
    }
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      issues.push(`maxRetries: must be a non-negative integer, got ${String(maxRetries)}`);
    }
    if (issues.length > 0) {
      throw new ValidationError(`Invalid submission: ${issues.join('; ')}`, issues);
    }
  }
}

/** Pass targets through, turning a failure to read them into a `ValidationError`. */
async function* readableInput(targets: AsyncIterable<Target> | Iterable<Target>): AsyncIterable<Target> {
  try {
    for await (const target of targets) {
      yield target;
    }
  } catch (error) {
    if (error instanceof ValidationError) throw error;
    throw new ValidationError(`Input could not be read: ${toErrorMessage(error)}`, [], { cause: error });
  }
}
