import { BatchStatus, IntegrityError } from '@scrapeflow/core';
import type { Batch } from '@scrapeflow/core';
import type { BatchRow } from '../models/BatchModel.js';
import { toMillis } from './columns.js';

/** Full row for `batch`. Unset optional fields become `NULL` so an update clears them. */
export function toRow(batch: Batch, version: number): BatchRow {
  return {
    id: batch.id,
    jobId: batch.jobId,
    batchIndex: batch.index,
    status: batch.status,
    attemptCount: batch.attemptCount,
    maxRetries: batch.maxRetries,
    inputRef: batch.inputRef,
    targetCount: batch.targetCount,
    firstTargetIndex: batch.firstTargetIndex,
    outputRef: batch.outputRef ?? null,
    recordCount: batch.recordCount ?? null,
    lastError: batch.lastError ?? null,
    workerId: batch.workerId ?? null,
    claimedAt: batch.claimedAt ?? null,
    availableAt: batch.availableAt ?? null,
    completedAt: batch.completedAt ?? null,
    version,
  };
}

export function toDomain(row: BatchRow): Batch {
  return {
    id: row.id,
    jobId: row.jobId,
    index: row.batchIndex,
    status: toBatchStatus(row.status, row.id),
    attemptCount: row.attemptCount,
    maxRetries: row.maxRetries,
    inputRef: row.inputRef,
    targetCount: row.targetCount,
    firstTargetIndex: row.firstTargetIndex,
    outputRef: row.outputRef ?? undefined,
    recordCount: row.recordCount ?? undefined,
    lastError: row.lastError ?? undefined,
    workerId: row.workerId ?? undefined,
    claimedAt: toMillis(row.claimedAt),
    availableAt: toMillis(row.availableAt),
    completedAt: toMillis(row.completedAt),
  };
}

function toBatchStatus(value: string, batchId: string): BatchStatus {
  const status = Object.values(BatchStatus).find((s) => s === value);
  if (!status) {
    throw new IntegrityError(`Batch '${batchId}' has unknown status '${value}'`);
  }
  return status;
}
