import { z } from 'zod';
import type { ExtractionContext, ExtractionService } from '../../domain/ports/ExtractionService.js';
import type { ExtractedRecord, Target } from '../../domain/model/Target.js';
import { PermanentError, TransientError, toErrorMessage } from '../../domain/errors/PipelineErrors.js';

export interface HttpExtractionServiceOptions {
  /** Endpoint that accepts `POST { jobId, batchIndex, targets }` and answers `{ records }`. */
  readonly endpoint: string;
  /** Extra request headers, e.g. authorization. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Injectable `fetch`, for tests and custom agents. Default: global `fetch`. */
  readonly fetchFn?: typeof fetch;
}

const ExtractionResponseSchema = z.object({
  records: z.array(z.record(z.unknown())),
});

/** Status codes worth another attempt. */
const TRANSIENT_STATUSES = new Set([408, 425, 429]);

/**
 * Extraction service reached over HTTP.
 *
 * Network errors, aborts, 408/425/429 and 5xx answers become
 * `TransientError` (`Retry-After` is honoured); any other 4xx and any
 * malformed body become `PermanentError`.
 */
export class HttpExtractionService implements ExtractionService {
  private readonly endpoint: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly fetchFn: typeof fetch;

  constructor(options: HttpExtractionServiceOptions) {
    this.endpoint = options.endpoint;
    this.headers = options.headers ?? {};
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async extract(targets: readonly Target[], context: ExtractionContext): Promise<readonly ExtractedRecord[]> {
    let response: Response;
    try {
      response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: { 'content-type': 'application/json', accept: 'application/json', ...this.headers },
        body: JSON.stringify({ jobId: context.jobId, batchIndex: context.batchIndex, targets }),
        signal: context.signal,
      });
    } catch (error) {
      throw new TransientError(`Extraction request failed: ${toErrorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const message = `Extraction endpoint answered ${String(response.status)} ${response.statusText}`.trim();
      if (response.status >= 500 || TRANSIENT_STATUSES.has(response.status)) {
        throw new TransientError(message, { retryAfterMs: parseRetryAfter(response.headers.get('retry-after')) });
      }
      throw new PermanentError(message);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new PermanentError(`Extraction response is not JSON: ${toErrorMessage(error)}`, { cause: error });
    }

    const parsed = ExtractionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PermanentError(`Extraction response has an unexpected shape: ${parsed.error.message}`);
    }
    return parsed.data.records;
  }
}

/** `Retry-After` as milliseconds: either delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (value === null || value.trim() === '') return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}
