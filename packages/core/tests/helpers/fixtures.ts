import { createBatch } from '../../src/domain/model/Batch.js';
import type { Batch } from '../../src/domain/model/Batch.js';
import type { Job } from '../../src/domain/model/Job.js';
import { ConsoleLogger } from '../../src/infrastructure/logging/ConsoleLogger.js';
import type { Logger } from '../../src/domain/ports/Logger.js';

export function makeJob(id: string, overrides: Partial<Job> = {}): Job {
  return {
    id,
    status: 'PENDING',
    createdAt: 1_700_000_000_000,
    totalBatches: 3,
    totalTargets: 25,
    batchSize: 10,
    maxRetries: 2,
    inputRef: `${id}/inputs`,
    ...overrides,
  };
}

export function makeBatches(jobId: string, count: number, maxRetries = 2): Batch[] {
  return Array.from({ length: count }, (_, index) =>
    createBatch({
      jobId,
      index,
      maxRetries,
      inputRef: `${jobId}/inputs/batch_${String(index).padStart(6, '0')}.json`,
      targetCount: 10,
      firstTargetIndex: index * 10,
    }),
  );
}

export function silentLogger(): Logger {
  return new ConsoleLogger({ level: 'silent' });
}
