import { createReadStream } from 'node:fs';
import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { createInterface } from 'node:readline';
import { randomUUID } from 'node:crypto';
import type { ArtifactWriteResult, FragmentStore, OutputFragment } from '../../domain/ports/FragmentStore.js';
import type { ExtractedRecord, Target } from '../../domain/model/Target.js';
import { IntegrityError, ValidationError, toErrorMessage } from '../../domain/errors/PipelineErrors.js';
import { isMissingFile, writeFileAtomic } from '../fs/atomicWrite.js';
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

export interface FileFragmentStoreOptions {
  /** Root directory of all job data. Default: `'.scrapeflow/jobs'`. */
  readonly directory?: string;
  /** Records buffered before each write to the merged artifact. Default: `1000`. */
  readonly artifactFlushEvery?: number;
}

/**
 * Fragment store on the local file system. Layout per job:
 *
 * ```
 * {directory}/{jobId}/inputs/batch_000000.{submissionId}.json
 * {directory}/{jobId}/outputs/batch_000000.a{attempt}.json
 * {directory}/{jobId}/result.jsonl
 * ```
 *
 * Every file is written under a temporary name and renamed into place. A ref
 * that resolves outside `directory` is rejected with a `ValidationError`.
 */
export class FileFragmentStore implements FragmentStore {
  private readonly directory: string;
  private readonly artifactFlushEvery: number;

  constructor(options?: FileFragmentStoreOptions) {
    this.directory = options?.directory ?? join('.scrapeflow', 'jobs');
    this.artifactFlushEvery = Math.max(1, options?.artifactFlushEvery ?? 1000);
  }

  async writeInput(jobId: string, submissionId: string, batchIndex: number, targets: readonly Target[]): Promise<string> {
    const ref = inputRefFor(jobId, submissionId, batchIndex);
    await writeFileAtomic(this.pathOf(ref), encodeInput(batchIndex, targets));
    return ref;
  }

  async readInput(ref: string): Promise<readonly Target[]> {
    return decodeInput(ref, await this.read(ref));
  }

  async writeOutput(
    jobId: string,
    batchIndex: number,
    attempt: number,
    records: readonly ExtractedRecord[],
  ): Promise<string> {
    const ref = outputRefFor(jobId, batchIndex, attempt);
    await writeFileAtomic(this.pathOf(ref), encodeOutput(batchIndex, records));
    return ref;
  }

  async readOutput(ref: string): Promise<OutputFragment> {
    return decodeOutput(ref, await this.read(ref));
  }

  async writeArtifact(jobId: string, records: AsyncIterable<ExtractedRecord>): Promise<ArtifactWriteResult> {
    const ref = artifactRefFor(jobId);
    const finalPath = this.pathOf(ref);
    const tempPath = `${finalPath}.${randomUUID()}.tmp`;
    await mkdir(dirname(finalPath), { recursive: true });

    const handle = await open(tempPath, 'w');
    let recordCount = 0;
    try {
      let pending: string[] = [];
      for await (const record of records) {
        pending.push(encodeArtifactLine(record));
        recordCount++;
        if (pending.length >= this.artifactFlushEvery) {
          await handle.write(pending.join(''));
          pending = [];
        }
      }
      if (pending.length > 0) {
        await handle.write(pending.join(''));
      }
      await handle.sync();
    } catch (error) {
      await handle.close();
      await rm(tempPath, { force: true });
      throw error;
    }

    await handle.close();
    await rename(tempPath, finalPath);
    return { ref, recordCount };
  }

  async *readArtifact(ref: string): AsyncIterable<ExtractedRecord> {
    const stream = createReadStream(this.pathOf(ref), { encoding: 'utf-8' });
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    let lineNumber = 0;
    try {
      for await (const line of lines) {
        lineNumber++;
        if (line === '') continue;
        yield decodeArtifactLine(ref, line, lineNumber);
      }
    } catch (error) {
      if (isMissingFile(error)) {
        throw new IntegrityError(`Artifact '${ref}' not found`, { cause: error });
      }
      throw error;
    } finally {
      lines.close();
      stream.destroy();
    }
  }

  inputLocation(jobId: string): string {
    return `${jobId}/inputs`;
  }

  async removeFragments(refs: readonly string[]): Promise<void> {
    const paths = refs.map((ref) => this.pathOf(ref));
    for (const path of paths) {
      await rm(path, { force: true });
    }
  }

  private async read(ref: string): Promise<string> {
    const path = this.pathOf(ref);
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new IntegrityError(`Fragment '${ref}' not found`, { cause: error });
      }
      throw new IntegrityError(`Fragment '${ref}' could not be read: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  private pathOf(ref: string): string {
    const root = resolve(this.directory);
    const path = resolve(root, ...ref.split('/'));
    const inside = relative(root, path);
    if (inside === '' || inside === '..' || inside.startsWith(`..${sep}`) || isAbsolute(inside)) {
      throw new ValidationError(`Fragment ref '${ref}' points outside the fragment directory`);
    }
    return path;
  }
}
