/**
 * One scrape target as read from the input: a bare identifier, or a row of
 * named columns when the input is tabular. Opaque to the pipeline.
 */
export type Target = string | Readonly<Record<string, string>>;

/** One record returned by the extraction service for a batch. Opaque to the pipeline. */
export type ExtractedRecord = Readonly<Record<string, unknown>>;
