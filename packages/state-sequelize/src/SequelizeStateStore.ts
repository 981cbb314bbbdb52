import { Op, UniqueConstraintError } from 'sequelize';
import type { Sequelize, WhereAttributeHash } from 'sequelize';
import {
  InvalidJobStateError,
  ValidationError,
  applyClaim,
  applyCompletion,
  applyFailure,
  applyReclaim,
  canTransition,
  claimRejection,
  isHeldBy,
  isStaleClaim,
  isTerminalStatus,
} from '@scrapeflow/core';
import type {
  Batch,
  BatchCompletion,
  BatchCounts,
  BatchFailure,
  ClaimBatchOptions,
  ClaimBatchResult,
  Job,
  JobListFilter,
  JobStatus,
  JobTransitionPatch,
  StateStore,
} from '@scrapeflow/core';
import { defineJobModel } from './models/JobModel.js';
import type { JobModel, JobRow } from './models/JobModel.js';
import { defineBatchModel } from './models/BatchModel.js';
import type { BatchModel, BatchRow } from './models/BatchModel.js';
import * as JobMapper from './mappers/JobMapper.js';
import * as BatchMapper from './mappers/BatchMapper.js';

export interface SequelizeStateStoreOptions {
  /** Prefix of the table names: `{prefix}_jobs` and `{prefix}_batches`. Default: `'scrapeflow'`. */
  readonly tablePrefix?: string;
}

/**
 * Sequelize-based `StateStore` adapter for `@scrapeflow/core`.
 *
 * Persists jobs and batches to a relational database using Sequelize v6.
 * Supports any dialect supported by Sequelize (PostgreSQL, MySQL, MariaDB,
 * SQLite, MS SQL Server), and may be shared by several processes working on
 * the same jobs.
 *
 * Every batch row carries a `version` column. Claims, completions and
 * failures are computed from the row read and written back with
 * `UPDATE ... WHERE id = ? AND version = ?`, so of two writers racing on the
 * same row exactly one succeeds.
 *
 * Call `initialize()` after construction to create tables.
 */
export class SequelizeStateStore implements StateStore {
  private readonly sequelize: Sequelize;
  private readonly Job: JobModel;
  private readonly Batch: BatchModel;

  constructor(sequelize: Sequelize, options?: SequelizeStateStoreOptions) {
    const tablePrefix = options?.tablePrefix ?? 'scrapeflow';
    this.sequelize = sequelize;
    this.Job = defineJobModel(this.sequelize, tablePrefix);
    this.Batch = defineBatchModel(this.sequelize, tablePrefix);
  }

  async initialize(): Promise<void> {
    await this.Job.sync();
    await this.Batch.sync();
  }

  // ── Jobs ────────────────────────────────────────────────────────────

  async createJob(job: Job, batches: readonly Batch[]): Promise<void> {
    const indices = new Set<number>();
    for (const batch of batches) {
      if (batch.jobId !== job.id) {
        throw new ValidationError(`Batch '${batch.id}' does not belong to job '${job.id}'`);
      }
      if (indices.has(batch.index)) {
        throw new ValidationError(`Duplicate batch ${String(batch.index)} in job '${job.id}'`);
      }
      indices.add(batch.index);
    }
    if (await this.Job.findByPk(job.id, { attributes: ['id'] })) {
      throw new ValidationError(`Job '${job.id}' already exists`);
    }

    try {
      await this.sequelize.transaction(async (transaction) => {
        await this.Job.create(JobMapper.toRow(job), { transaction });
        await this.Batch.bulkCreate(
          batches.map((b) => BatchMapper.toRow(b, 0)),
          { transaction },
        );
      });
    } catch (error) {
      // Another process created the same job between the check and the insert.
      if (error instanceof UniqueConstraintError) {
        throw new ValidationError(`Job '${job.id}' already exists`, [], { cause: error });
      }
      throw error;
    }
  }

  async getJob(jobId: string): Promise<Job | null> {
    const row = await this.Job.findByPk(jobId);
    return row ? JobMapper.toDomain(row.get({ plain: true })) : null;
  }

  async listJobs(filter: JobListFilter = {}): Promise<readonly Job[]> {
    const where: WhereAttributeHash<JobRow> = {};
    if (filter.status !== undefined) {
      const statuses: readonly JobStatus[] = typeof filter.status === 'string' ? [filter.status] : filter.status;
      where.status = { [Op.in]: [...statuses] };
    }
    if (filter.owner !== undefined) {
      where.owner = filter.owner;
    }
    if (!filter.includeArchived) {
      where.archivedAt = null;
    }

    const rows = await this.Job.findAll({
      where,
      order: [
        ['createdAt', 'DESC'],
        ['id', 'DESC'],
      ],
      limit: filter.limit !== undefined ? Math.max(0, filter.limit) : undefined,
    });
    return rows.map((r) => JobMapper.toDomain(r.get({ plain: true })));
  }

  async transitionJob(
    jobId: string,
    from: readonly JobStatus[],
    to: JobStatus,
    patch: JobTransitionPatch = {},
  ): Promise<boolean> {
    for (const status of from) {
      if (!canTransition(status, to)) {
        throw new InvalidJobStateError(`Invalid job transition: ${status} → ${to}`);
      }
    }

    const [affected] = await this.Job.update(JobMapper.toTransitionColumns(to, patch), {
      where: { id: jobId, status: { [Op.in]: [...from] } },
    });
    return affected > 0;
  }

  async archiveJob(jobId: string): Promise<boolean> {
    const job = await this.getJob(jobId);
    if (!job || !isTerminalStatus(job.status)) return false;
    if (job.archivedAt !== undefined) return true;

    await this.Job.update({ archivedAt: Date.now() }, { where: { id: jobId, archivedAt: null } });
    return true;
  }

  // ── Batches ─────────────────────────────────────────────────────────

  async getBatches(jobId: string): Promise<readonly Batch[]> {
    const rows = await this.Batch.findAll({ where: { jobId }, order: [['batchIndex', 'ASC']] });
    return rows.map((r) => BatchMapper.toDomain(r.get({ plain: true })));
  }

  async getBatch(jobId: string, batchId: string): Promise<Batch | null> {
    const row = await this.findBatchRow(jobId, batchId);
    return row ? BatchMapper.toDomain(row) : null;
  }

  async claimBatch(jobId: string, workerId: string, options: ClaimBatchOptions = {}): Promise<ClaimBatchResult> {
    const job = await this.Job.findByPk(jobId, { attributes: ['id', 'status'] });
    if (!job) {
      return { claimed: false, reason: 'JOB_NOT_FOUND' };
    }
    if (job.get('status') !== 'RUNNING') {
      return { claimed: false, reason: 'JOB_NOT_RUNNING' };
    }

    const now = Date.now();

    if (options.batchId !== undefined) {
      const row = await this.findBatchRow(jobId, options.batchId);
      if (!row) {
        return { claimed: false, reason: 'BATCH_NOT_FOUND' };
      }
      const batch = BatchMapper.toDomain(row);
      const rejection = claimRejection(batch, now);
      if (rejection) {
        return rejection;
      }
      const claimed = await this.writeIfUnchanged(row, applyClaim(batch, workerId, now));
      return claimed ? { claimed: true, batch: claimed } : { claimed: false, reason: 'BATCH_NOT_CLAIMABLE' };
    }

    const candidates = await this.Batch.findAll({
      where: { jobId, status: 'PENDING' },
      order: [['batchIndex', 'ASC']],
    });

    // A lost race moves on to the next candidate.
    for (const candidate of candidates) {
      const row = candidate.get({ plain: true });
      const batch = BatchMapper.toDomain(row);
      if (claimRejection(batch, now)) continue;

      const claimed = await this.writeIfUnchanged(row, applyClaim(batch, workerId, now));
      if (claimed) {
        return { claimed: true, batch: claimed };
      }
    }

    return { claimed: false, reason: 'NO_PENDING_BATCHES' };
  }

  async completeBatch(jobId: string, batchId: string, workerId: string, completion: BatchCompletion): Promise<boolean> {
    const row = await this.findBatchRow(jobId, batchId);
    if (!row) return false;

    const batch = BatchMapper.toDomain(row);
    if (!isHeldBy(batch, workerId)) return false;

    return (await this.writeIfUnchanged(row, applyCompletion(batch, completion, Date.now()))) !== null;
  }

  async failBatch(jobId: string, batchId: string, workerId: string, failure: BatchFailure): Promise<Batch | null> {
    const row = await this.findBatchRow(jobId, batchId);
    if (!row) return null;

    const batch = BatchMapper.toDomain(row);
    if (!isHeldBy(batch, workerId)) return null;

    return this.writeIfUnchanged(row, applyFailure(batch, failure, Date.now()));
  }

  async reclaimStaleBatches(jobId: string, timeoutMs: number): Promise<number> {
    const now = Date.now();
    const cutoff = now - timeoutMs;

    const stale = await this.Batch.findAll({
      where: { jobId, status: 'CLAIMED', claimedAt: { [Op.lte]: cutoff } },
      order: [['batchIndex', 'ASC']],
    });

    let reclaimed = 0;
    for (const candidate of stale) {
      const row = candidate.get({ plain: true });
      const batch = BatchMapper.toDomain(row);
      if (!isStaleClaim(batch, cutoff)) continue;
      if (await this.writeIfUnchanged(row, applyReclaim(batch, now))) {
        reclaimed++;
      }
    }
    return reclaimed;
  }

  async getBatchCounts(jobId: string): Promise<BatchCounts> {
    const groups = await this.Batch.count({ where: { jobId }, group: ['status'] });

    const countMap = new Map<unknown, number>();
    let total = 0;
    for (const group of groups) {
      const count = Number(group.count);
      countMap.set(group['status'], count);
      total += count;
    }

    const pending = countMap.get('PENDING') ?? 0;
    const claimed = countMap.get('CLAIMED') ?? 0;

    return {
      total,
      pending,
      claimed,
      completed: countMap.get('COMPLETED') ?? 0,
      failed: countMap.get('FAILED') ?? 0,
      settled: pending === 0 && claimed === 0,
    };
  }

  async getCompletedBatchIds(jobId: string): Promise<readonly string[]> {
    const rows = await this.Batch.findAll({
      attributes: ['id'],
      where: { jobId, status: 'COMPLETED' },
      order: [['batchIndex', 'ASC']],
    });
    return rows.map((r) => r.getDataValue('id'));
  }

  private async findBatchRow(jobId: string, batchId: string): Promise<BatchRow | null> {
    const row = await this.Batch.findOne({ where: { id: batchId, jobId } });
    return row ? row.get({ plain: true }) : null;
  }

  /**
   * Write `next` over `current` unless the row changed since it was read.
   *
   * @returns `next`, or `null` when another writer got there first.
   */
  private async writeIfUnchanged(current: BatchRow, next: Batch): Promise<Batch | null> {
    const [affected] = await this.Batch.update(BatchMapper.toRow(next, current.version + 1), {
      where: { id: current.id, version: current.version },
    });
    return affected === 1 ? next : null;
  }
}
