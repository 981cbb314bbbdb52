import { createReadStream, statSync } from 'node:fs';
import { basename, extname } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface FilePathSourceOptions {
  /** Encoding for reading the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

const MIME_TYPES: Readonly<Record<string, string>> = {
  '.csv': 'text/csv',
  '.tsv': 'text/tab-separated-values',
  '.txt': 'text/plain',
};

/** Data source that streams from a local file path using `createReadStream`. Node.js only. */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<string> {
    const stream = createReadStream(this.filePath, {
      encoding: this.encoding,
      highWaterMark: this.highWaterMark,
    });

    for await (const chunk of stream) {
      yield String(chunk);
    }
  }

  metadata(): SourceMetadata {
    const stats = statSync(this.filePath);
    return {
      fileName: basename(this.filePath),
      fileSize: stats.size,
      mimeType: MIME_TYPES[extname(this.filePath).toLowerCase()] ?? 'application/octet-stream',
    };
  }
}
