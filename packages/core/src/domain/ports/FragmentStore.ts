import type { ExtractedRecord, Target } from '../model/Target.js';

/** Decoded output fragment of one batch. */
export interface OutputFragment {
  readonly batchIndex: number;
  readonly recordCount: number;
  readonly records: readonly ExtractedRecord[];
}

/** Result of writing the merged artifact. */
export interface ArtifactWriteResult {
  readonly ref: string;
  readonly recordCount: number;
}

/**
 * Port for the bulk data of a job: per-batch input slices, per-batch output
 * fragments and the merged artifact. Locations are opaque `ref` strings that
 * the job and batch records carry.
 *
 * Reads raise `IntegrityError` when a fragment is missing, unreadable or
 * fails its checksum.
 */
export interface FragmentStore {
  /**
   * Write the targets of one batch. Fragments written under different
   * `submissionId`s never replace each other, so a rejected submission can
   * remove exactly what it wrote.
   */
  writeInput(jobId: string, submissionId: string, batchIndex: number, targets: readonly Target[]): Promise<string>;
  readInput(ref: string): Promise<readonly Target[]>;
  /**
   * Write the records of one attempt at a batch. Each attempt gets its own
   * ref; only the ref a successful `completeBatch` records is ever merged.
   */
  writeOutput(jobId: string, batchIndex: number, attempt: number, records: readonly ExtractedRecord[]): Promise<string>;
  readOutput(ref: string): Promise<OutputFragment>;
  /**
   * Write the merged artifact from a stream of records. Nothing is visible
   * under the returned ref unless the whole stream was written; an error
   * thrown by the stream propagates and leaves no artifact behind.
   */
  writeArtifact(jobId: string, records: AsyncIterable<ExtractedRecord>): Promise<ArtifactWriteResult>;
  readArtifact(ref: string): AsyncIterable<ExtractedRecord>;
  /** Location under which a job's input fragments are stored. */
  inputLocation(jobId: string): string;
  /** Delete the given fragments. Refs that do not exist are ignored. */
  removeFragments(refs: readonly string[]): Promise<void>;
}
