import { z } from 'zod';

const JobFailureSchema = z.object({
  code: z.string(),
  message: z.string(),
  batchId: z.string().optional(),
  batchIndex: z.number().int().optional(),
});

export const JobSchema = z.object({
  id: z.string().min(1),
  owner: z.string().optional(),
  status: z.enum(['PENDING', 'RUNNING', 'COMPLETED', 'FAILED', 'CANCELLED']),
  createdAt: z.number(),
  startedAt: z.number().optional(),
  completedAt: z.number().optional(),
  totalBatches: z.number().int().nonnegative(),
  totalTargets: z.number().int().nonnegative(),
  batchSize: z.number().int().positive(),
  maxRetries: z.number().int().nonnegative(),
  inputRef: z.string(),
  finalArtifactRef: z.string().optional(),
  failure: JobFailureSchema.optional(),
  archivedAt: z.number().optional(),
  metadata: z.record(z.unknown()).optional(),
  rerunOf: z.string().optional(),
});

export const BatchSchema = z.object({
  id: z.string().min(1),
  jobId: z.string().min(1),
  index: z.number().int().nonnegative(),
  status: z.enum(['PENDING', 'CLAIMED', 'COMPLETED', 'FAILED']),
  attemptCount: z.number().int().nonnegative(),
  maxRetries: z.number().int().nonnegative(),
  inputRef: z.string(),
  targetCount: z.number().int().nonnegative(),
  firstTargetIndex: z.number().int().nonnegative(),
  outputRef: z.string().optional(),
  recordCount: z.number().int().nonnegative().optional(),
  lastError: z.string().optional(),
  workerId: z.string().optional(),
  claimedAt: z.number().optional(),
  availableAt: z.number().optional(),
  completedAt: z.number().optional(),
});

/** On-disk shape of one job file. */
export const JobDocumentSchema = z.object({
  job: JobSchema,
  batches: z.array(BatchSchema),
});
