import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { ExtractedRecord, Target } from '../../domain/model/Target.js';
import type { OutputFragment } from '../../domain/ports/FragmentStore.js';
import { IntegrityError, toErrorMessage } from '../../domain/errors/PipelineErrors.js';

const TargetSchema = z.union([z.string(), z.record(z.string())]);
const RecordSchema = z.record(z.unknown());

const InputEnvelopeSchema = z.object({
  batchIndex: z.number().int().nonnegative(),
  targetCount: z.number().int().nonnegative(),
  checksum: z.string(),
  targets: z.array(TargetSchema),
});

const OutputEnvelopeSchema = z.object({
  batchIndex: z.number().int().nonnegative(),
  recordCount: z.number().int().nonnegative(),
  checksum: z.string(),
  records: z.array(RecordSchema),
});

/**
 * File name of a batch fragment. The index is zero-padded so a directory
 * listing sorts by index; `tag` tells apart fragments of the same batch
 * written by different submissions or attempts.
 */
export function fragmentName(batchIndex: number, tag: string): string {
  return `batch_${String(batchIndex).padStart(6, '0')}.${tag}.json`;
}

export function inputRefFor(jobId: string, submissionId: string, batchIndex: number): string {
  return `${jobId}/inputs/${fragmentName(batchIndex, submissionId)}`;
}

export function outputRefFor(jobId: string, batchIndex: number, attempt: number): string {
  return `${jobId}/outputs/${fragmentName(batchIndex, `a${String(attempt)}`)}`;
}

export function artifactRefFor(jobId: string): string {
  return `${jobId}/result.jsonl`;
}

function checksum(payload: unknown): string {
  return createHash('sha256').update(JSON.stringify(payload)).digest('hex');
}

export function encodeInput(batchIndex: number, targets: readonly Target[]): string {
  return JSON.stringify({ batchIndex, targetCount: targets.length, checksum: checksum(targets), targets });
}

export function encodeOutput(batchIndex: number, records: readonly ExtractedRecord[]): string {
  return JSON.stringify({ batchIndex, recordCount: records.length, checksum: checksum(records), records });
}

export function decodeInput(ref: string, content: string): readonly Target[] {
  const envelope = parseEnvelope(ref, content, InputEnvelopeSchema);
  if (envelope.targets.length !== envelope.targetCount || checksum(envelope.targets) !== envelope.checksum) {
    throw new IntegrityError(`Input fragment '${ref}' failed its integrity check`, {
      batchIndex: envelope.batchIndex,
    });
  }
  return envelope.targets;
}

export function decodeOutput(ref: string, content: string): OutputFragment {
  const envelope = parseEnvelope(ref, content, OutputEnvelopeSchema);
  if (envelope.records.length !== envelope.recordCount || checksum(envelope.records) !== envelope.checksum) {
    throw new IntegrityError(`Output fragment '${ref}' failed its integrity check`, {
      batchIndex: envelope.batchIndex,
    });
  }
  return { batchIndex: envelope.batchIndex, recordCount: envelope.recordCount, records: envelope.records };
}

/** One line of the merged artifact. */
export function encodeArtifactLine(record: ExtractedRecord): string {
  return `${JSON.stringify(record)}\n`;
}

export function decodeArtifactLine(ref: string, line: string, lineNumber: number): ExtractedRecord {
  try {
    return RecordSchema.parse(JSON.parse(line));
  } catch (error) {
    throw new IntegrityError(`Artifact '${ref}' line ${String(lineNumber)} is unreadable: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
}

function parseEnvelope<T>(ref: string, content: string, schema: z.ZodType<T>): T {
  try {
    return schema.parse(JSON.parse(content));
  } catch (error) {
    throw new IntegrityError(`Fragment '${ref}' is unreadable: ${toErrorMessage(error)}`, { cause: error });
  }
}
