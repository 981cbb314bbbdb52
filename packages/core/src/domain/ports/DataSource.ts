/** Metadata about the data source (optional, for logging). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
  readonly mimeType?: string;
}

/**
 * Port for reading raw input from any origin (file, buffer, ...).
 *
 * Record boundaries are unknown at this level: `read()` yields text chunks
 * that a `TargetParser` turns into targets.
 */
export interface DataSource {
  /** Yield data chunks for lazy/streaming consumption. */
  read(): AsyncIterable<string | Buffer>;
  metadata(): SourceMetadata;
}
