import { IntegrityError, JobStatus } from '@scrapeflow/core';
import type { Job, JobFailure, JobTransitionPatch } from '@scrapeflow/core';
import type { JobRow } from '../models/JobModel.js';
import { parseJson } from '../utils/parseJson.js';
import { toMillis } from './columns.js';

export function toRow(job: Job): JobRow {
  return {
    id: job.id,
    owner: job.owner ?? null,
    status: job.status,
    createdAt: job.createdAt,
    startedAt: job.startedAt ?? null,
    completedAt: job.completedAt ?? null,
    totalBatches: job.totalBatches,
    totalTargets: job.totalTargets,
    batchSize: job.batchSize,
    maxRetries: job.maxRetries,
    inputRef: job.inputRef,
    finalArtifactRef: job.finalArtifactRef ?? null,
    ...failureColumns(job.failure),
    archivedAt: job.archivedAt ?? null,
    metadata: job.metadata ?? null,
    rerunOf: job.rerunOf ?? null,
  };
}

/** Columns written by a status transition. Fields absent from the patch are left as they are. */
export function toTransitionColumns(to: JobStatus, patch: JobTransitionPatch): Partial<JobRow> {
  const columns: Partial<JobRow> = { status: to };
  if (patch.startedAt !== undefined) columns.startedAt = patch.startedAt;
  if (patch.completedAt !== undefined) columns.completedAt = patch.completedAt;
  if (patch.finalArtifactRef !== undefined) columns.finalArtifactRef = patch.finalArtifactRef;
  if (patch.failure !== undefined) Object.assign(columns, failureColumns(patch.failure));
  return columns;
}

export function toDomain(row: JobRow): Job {
  return {
    id: row.id,
    owner: row.owner ?? undefined,
    status: toJobStatus(row.status, row.id),
    createdAt: Number(row.createdAt),
    startedAt: toMillis(row.startedAt),
    completedAt: toMillis(row.completedAt),
    totalBatches: row.totalBatches,
    totalTargets: row.totalTargets,
    batchSize: row.batchSize,
    maxRetries: row.maxRetries,
    inputRef: row.inputRef,
    finalArtifactRef: row.finalArtifactRef ?? undefined,
    failure: toFailure(row),
    archivedAt: toMillis(row.archivedAt),
    metadata: toMetadata(row.metadata, row.id),
    rerunOf: row.rerunOf ?? undefined,
  };
}

function failureColumns(
  failure: JobFailure | undefined,
): Pick<JobRow, 'failureCode' | 'failureMessage' | 'failureBatchId' | 'failureBatchIndex'> {
  return {
    failureCode: failure?.code ?? null,
    failureMessage: failure?.message ?? null,
    failureBatchId: failure?.batchId ?? null,
    failureBatchIndex: failure?.batchIndex ?? null,
  };
}

function toFailure(row: JobRow): JobFailure | undefined {
  if (row.failureCode === null) return undefined;
  return {
    code: row.failureCode,
    message: row.failureMessage ?? '',
    batchId: row.failureBatchId ?? undefined,
    batchIndex: row.failureBatchIndex ?? undefined,
  };
}

function toJobStatus(value: string, jobId: string): JobStatus {
  const status = Object.values(JobStatus).find((s) => s === value);
  if (!status) {
    throw new IntegrityError(`Job '${jobId}' has unknown status '${value}'`);
  }
  return status;
}

function toMetadata(value: unknown, jobId: string): Readonly<Record<string, unknown>> | undefined {
  const parsed = parseJson(value);
  if (parsed === null) return undefined;
  if (!isRecord(parsed)) {
    throw new IntegrityError(`Metadata of job '${jobId}' is not an object`);
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
