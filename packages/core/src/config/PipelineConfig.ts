import { z } from 'zod';
import { ValidationError } from '../domain/errors/PipelineErrors.js';

/**
 * Pipeline configuration schema with validation and defaults.
 */
export const PipelineConfigSchema = z.object({
  /** Targets per batch. */
  batchSize: z.number().int().positive().default(10000),

  /** Retries per batch after its first attempt. */
  maxRetries: z.number().int().nonnegative().default(2),

  /** Concurrent workers, and so concurrent extraction calls. */
  concurrency: z.number().int().positive().default(4),

  /** Backoff after the first failed attempt; grows linearly per attempt. */
  retryBaseDelayMs: z.number().int().nonnegative().default(10000),

  /** Upper bound for any backoff. */
  retryMaxDelayMs: z.number().int().nonnegative().default(300000),

  /** Abort a single extraction call after this long (0 disables). */
  extractionTimeoutMs: z.number().int().nonnegative().default(300000),

  /** Claims older than this are presumed abandoned on resume. */
  staleClaimTimeoutMs: z.number().int().positive().default(900000),

  /** Root directory for file-backed state and fragments. */
  dataDir: z.string().min(1).default('.scrapeflow'),

  logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('info'),

  logFormat: z.enum(['text', 'json']).default('text'),

  /** Receives a POST when a job completes or fails. */
  webhookUrl: z.string().url().optional(),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/** Partial configuration accepted by `parsePipelineConfig`; omitted keys take their defaults. */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/** Environment variable read for each configuration key. */
export const CONFIG_ENV_VARS = {
  batchSize: 'SCRAPEFLOW_BATCH_SIZE',
  maxRetries: 'SCRAPEFLOW_MAX_RETRIES',
  concurrency: 'SCRAPEFLOW_CONCURRENCY',
  retryBaseDelayMs: 'SCRAPEFLOW_RETRY_BASE_DELAY_MS',
  retryMaxDelayMs: 'SCRAPEFLOW_RETRY_MAX_DELAY_MS',
  extractionTimeoutMs: 'SCRAPEFLOW_EXTRACTION_TIMEOUT_MS',
  staleClaimTimeoutMs: 'SCRAPEFLOW_STALE_CLAIM_TIMEOUT_MS',
  dataDir: 'SCRAPEFLOW_DATA_DIR',
  logLevel: 'SCRAPEFLOW_LOG_LEVEL',
  logFormat: 'SCRAPEFLOW_LOG_FORMAT',
  webhookUrl: 'SCRAPEFLOW_WEBHOOK_URL',
} as const satisfies Record<keyof PipelineConfig, string>;

const NUMERIC_KEYS = [
  'batchSize',
  'maxRetries',
  'concurrency',
  'retryBaseDelayMs',
  'retryMaxDelayMs',
  'extractionTimeoutMs',
  'staleClaimTimeoutMs',
] as const;

/**
 * Validate a configuration object and fill in defaults.
 *
 * @throws ValidationError listing every offending key.
 */
export function parsePipelineConfig(input: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationError(`Invalid pipeline configuration: ${issues.join('; ')}`, issues);
  }
  if (result.data.retryMaxDelayMs < result.data.retryBaseDelayMs) {
    const issue = 'retryMaxDelayMs: must not be smaller than retryBaseDelayMs';
    throw new ValidationError(`Invalid pipeline configuration: ${issue}`, [issue]);
  }
  return result.data;
}

/**
 * Loads pipeline configuration from environment variables.
 *
 * Environment variables (all optional):
 * - SCRAPEFLOW_BATCH_SIZE: targets per batch (default: 10000)
 * - SCRAPEFLOW_MAX_RETRIES: retries per batch (default: 2)
 * - SCRAPEFLOW_CONCURRENCY: workers (default: 4)
 * - SCRAPEFLOW_RETRY_BASE_DELAY_MS / SCRAPEFLOW_RETRY_MAX_DELAY_MS: backoff (default: 10000 / 300000)
 * - SCRAPEFLOW_EXTRACTION_TIMEOUT_MS: per-call timeout (default: 300000)
 * - SCRAPEFLOW_STALE_CLAIM_TIMEOUT_MS: claim expiry (default: 900000)
 * - SCRAPEFLOW_DATA_DIR: data directory (default: .scrapeflow)
 * - SCRAPEFLOW_LOG_LEVEL / SCRAPEFLOW_LOG_FORMAT: logging (default: info / text)
 * - SCRAPEFLOW_WEBHOOK_URL: completion webhook (default: none)
 *
 * @param overrides - Values that win over the environment.
 */
export function loadPipelineConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides: PipelineConfigInput = {},
): PipelineConfig {
  const raw: Record<string, unknown> = {};

  for (const [key, variable] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[variable]?.trim();
    if (value === undefined || value === '') continue;
    raw[key] = isNumericKey(key) ? toNumber(value) : value;
  }

  return parsePipelineConfig({ ...raw, ...overrides });
}

function isNumericKey(key: string): boolean {
  return NUMERIC_KEYS.some((k) => k === key);
}

/** Numeric text as a number; anything else is passed through for the schema to reject. */
function toNumber(value: string): number | string {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : value;
}
