import type { ExtractedRecord, Target } from '../model/Target.js';

/** What the extraction service knows about the attempt it serves. */
export interface ExtractionContext {
  readonly jobId: string;
  readonly batchId: string;
  readonly batchIndex: number;
  /** 1-based attempt number. */
  readonly attempt: number;
  /** Aborted when the attempt times out. */
  readonly signal: AbortSignal;
}

/**
 * Port to the external extraction operation: one batch of targets in, records out.
 *
 * Throw `TransientError` for failures worth retrying and `PermanentError` for
 * ones that are not. Any other thrown value is treated as transient.
 * Rate limiting belongs to the implementation; the pipeline only bounds the
 * number of concurrent calls through its worker pool.
 */
export interface ExtractionService {
  extract(targets: readonly Target[], context: ExtractionContext): Promise<readonly ExtractedRecord[]>;
}
