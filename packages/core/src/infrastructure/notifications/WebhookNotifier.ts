import type { JobNotifier } from '../../domain/ports/JobNotifier.js';
import type { Job } from '../../domain/model/Job.js';
import { TransientError } from '../../domain/errors/PipelineErrors.js';

export interface WebhookNotifierOptions {
  readonly url: string;
  /** Abort the delivery after this long. Default: `10000`. */
  readonly timeoutMs?: number;
  readonly fetchFn?: typeof fetch;
}

/** Body posted to the webhook. */
export interface WebhookPayload {
  readonly jobId: string;
  readonly status: Job['status'];
  readonly owner?: string;
  readonly finalArtifactRef?: string;
  readonly failure?: Job['failure'];
  readonly completedAt?: number;
}

/** POSTs a JSON summary of a finished job to a fixed URL. */
export class WebhookNotifier implements JobNotifier {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: WebhookNotifierOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async notify(job: Job): Promise<void> {
    const payload: WebhookPayload = {
      jobId: job.id,
      status: job.status,
      owner: job.owner,
      finalArtifactRef: job.finalArtifactRef,
      failure: job.failure,
      completedAt: job.completedAt,
    };

    const response = await this.fetchFn(this.url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new TransientError(`Webhook answered ${String(response.status)}`);
    }
  }
}
