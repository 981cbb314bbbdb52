/** Machine-readable error codes carried by every `PipelineError`. */
export const PipelineErrorCode = {
  VALIDATION: 'VALIDATION',
  TRANSIENT: 'TRANSIENT',
  PERMANENT: 'PERMANENT',
  INTEGRITY: 'INTEGRITY',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_STATE: 'INVALID_STATE',
} as const;

export type PipelineErrorCode = (typeof PipelineErrorCode)[keyof typeof PipelineErrorCode];

/** Base class for all errors raised by the pipeline. */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Input rejected at submission: empty, unreadable or with bad parameters. Never retried. */
export class ValidationError extends PipelineError {
  /** Individual problems, one per offending field. */
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: { readonly cause?: unknown }) {
    super(PipelineErrorCode.VALIDATION, message, options);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Extraction failure that may succeed on a later attempt (timeouts, rate
 * limits, upstream 5xx). Retried until the batch runs out of attempts.
 */
export class TransientError extends PipelineError {
  /** Upstream hint for the earliest useful retry. */
  readonly retryAfterMs?: number;

  constructor(message: string, options?: { readonly cause?: unknown; readonly retryAfterMs?: number }) {
    super(PipelineErrorCode.TRANSIENT, message, options);
    this.name = 'TransientError';
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/** Extraction failure that no retry can fix. Exhausts the batch at once. */
export class PermanentError extends PipelineError {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(PipelineErrorCode.PERMANENT, message, options);
    this.name = 'PermanentError';
  }
}

/** A stored fragment is missing, unreadable or does not match its batch. Aborts the merge. */
export class IntegrityError extends PipelineError {
  readonly batchIndex?: number;

  constructor(message: string, options?: { readonly cause?: unknown; readonly batchIndex?: number }) {
    super(PipelineErrorCode.INTEGRITY, message, options);
    this.name = 'IntegrityError';
    this.batchIndex = options?.batchIndex;
  }
}

export class JobNotFoundError extends PipelineError {
  readonly jobId: string;

  constructor(jobId: string) {
    super(PipelineErrorCode.NOT_FOUND, `Job '${jobId}' not found`);
    this.name = 'JobNotFoundError';
    this.jobId = jobId;
  }
}

/** An operation or status transition the job's current status does not allow. */
export class InvalidJobStateError extends PipelineError {
  constructor(message: string) {
    super(PipelineErrorCode.INVALID_STATE, message);
    this.name = 'InvalidJobStateError';
  }
}

/** Message of any thrown value. */
export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** `true` when the error should exhaust its batch instead of being retried. */
export function isPermanentFailure(error: unknown): boolean {
  return error instanceof PermanentError || error instanceof ValidationError || error instanceof IntegrityError;
}
