import { TransientError } from '../errors/PipelineErrors.js';

export interface RetryPolicyOptions {
  /** Delay after the first failed attempt; grows linearly with the attempt number. */
  readonly baseDelayMs: number;
  /** Upper bound for any delay, including server-provided hints. */
  readonly maxDelayMs: number;
}

/**
 * Linear backoff between batch attempts: `baseDelayMs × attempt`, capped at
 * `maxDelayMs`. A `TransientError.retryAfterMs` hint replaces the computed
 * delay (still capped).
 */
export class RetryPolicy {
  constructor(private readonly options: RetryPolicyOptions) {
    if (options.baseDelayMs < 0 || options.maxDelayMs < 0) {
      throw new RangeError('Retry delays must not be negative');
    }
  }

  /** Delay before the attempt after `attempt` (1-based) may start. */
  delayFor(attempt: number, error?: unknown): number {
    const hinted = error instanceof TransientError ? error.retryAfterMs : undefined;
    const delay = hinted ?? this.options.baseDelayMs * Math.max(1, attempt);
    return Math.min(Math.max(0, delay), this.options.maxDelayMs);
  }
}
