import { describe, it, expect } from 'vitest';
import { applyClaim, applyCompletion, createBatch } from '@scrapeflow/core';
import * as BatchMapper from '../../src/mappers/BatchMapper.js';

const fresh = createBatch({
  jobId: 'job-001',
  index: 4,
  maxRetries: 2,
  inputRef: 'job-001/inputs/batch_000004.json',
  targetCount: 10,
  firstTargetIndex: 40,
});

describe('BatchMapper', () => {
  it('should map the index to its own column and carry the version', () => {
    const row = BatchMapper.toRow(fresh, 7);

    expect(row.id).toBe('job-001:000004');
    expect(row.batchIndex).toBe(4);
    expect(row.version).toBe(7);
    expect(row.workerId).toBeNull();
  });

  it('should restore a claimed batch', () => {
    const claimed = applyClaim(fresh, 'w-1', 1_700_000_000_000);

    expect(BatchMapper.toDomain(BatchMapper.toRow(claimed, 1))).toEqual({
      ...fresh,
      status: 'CLAIMED',
      attemptCount: 1,
      workerId: 'w-1',
      claimedAt: 1_700_000_000_000,
    });
  });

  it('should null the claim columns once the batch completes', () => {
    const completed = applyCompletion(applyClaim(fresh, 'w-1', 1000), { outputRef: 'out', recordCount: 9 }, 2000);
    const row = BatchMapper.toRow(completed, 2);

    expect(row.workerId).toBeNull();
    expect(row.claimedAt).toBeNull();
    expect(row.completedAt).toBe(2000);
    expect(row.recordCount).toBe(9);
  });

  it('should reject an unknown status', () => {
    expect(() => BatchMapper.toDomain({ ...BatchMapper.toRow(fresh, 0), status: 'RUNNING' })).toThrow(
      "Batch 'job-001:000004' has unknown status 'RUNNING'",
    );
  });
});
