import type { ArtifactWriteResult, FragmentStore, OutputFragment } from '../../domain/ports/FragmentStore.js';
import type { ExtractedRecord, Target } from '../../domain/model/Target.js';
import { IntegrityError } from '../../domain/errors/PipelineErrors.js';
import {
  artifactRefFor,
  decodeArtifactLine,
  decodeInput,
  decodeOutput,
  encodeArtifactLine,
  encodeInput,
  encodeOutput,
  inputRefFor,
  outputRefFor,
} from './fragmentCodec.js';

/**
 * Non-persistent fragment store. Fragments are kept encoded, exactly as the
 * file store writes them, so both go through the same integrity checks.
 */
export class InMemoryFragmentStore implements FragmentStore {
  private readonly entries = new Map<string, string>();

  writeInput(jobId: string, submissionId: string, batchIndex: number, targets: readonly Target[]): Promise<string> {
    const ref = inputRefFor(jobId, submissionId, batchIndex);
    this.entries.set(ref, encodeInput(batchIndex, targets));
    return Promise.resolve(ref);
  }

  async readInput(ref: string): Promise<readonly Target[]> {
    return decodeInput(ref, await this.read(ref));
  }

  writeOutput(jobId: string, batchIndex: number, attempt: number, records: readonly ExtractedRecord[]): Promise<string> {
    const ref = outputRefFor(jobId, batchIndex, attempt);
    this.entries.set(ref, encodeOutput(batchIndex, records));
    return Promise.resolve(ref);
  }

  async readOutput(ref: string): Promise<OutputFragment> {
    return decodeOutput(ref, await this.read(ref));
  }

  async writeArtifact(jobId: string, records: AsyncIterable<ExtractedRecord>): Promise<ArtifactWriteResult> {
    const lines: string[] = [];
    for await (const record of records) {
      lines.push(encodeArtifactLine(record));
    }
    const ref = artifactRefFor(jobId);
    this.entries.set(ref, lines.join(''));
    return { ref, recordCount: lines.length };
  }

  async *readArtifact(ref: string): AsyncIterable<ExtractedRecord> {
    const content = await this.read(ref);
    let lineNumber = 0;
    for (const line of content.split('\n')) {
      lineNumber++;
      if (line === '') continue;
      yield decodeArtifactLine(ref, line, lineNumber);
    }
  }

  inputLocation(jobId: string): string {
    return `${jobId}/inputs`;
  }

  removeFragments(refs: readonly string[]): Promise<void> {
    for (const ref of refs) {
      this.entries.delete(ref);
    }
    return Promise.resolve();
  }

  private read(ref: string): Promise<string> {
    const content = this.entries.get(ref);
    if (content === undefined) {
      return Promise.reject(new IntegrityError(`Fragment '${ref}' not found`));
    }
    return Promise.resolve(content);
  }
}
