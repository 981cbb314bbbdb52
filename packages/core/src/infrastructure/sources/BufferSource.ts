import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface BufferSourceOptions extends Partial<Pick<SourceMetadata, 'fileName' | 'mimeType'>> {
  /** Characters per yielded chunk. Default: the whole content in one chunk. */
  readonly chunkSize?: number;
}

/** Data source over an in-memory string or Buffer, e.g. an uploaded target list. */
export class BufferSource implements DataSource {
  private readonly content: string;
  private readonly meta: SourceMetadata;
  private readonly chunkSize: number;

  constructor(data: string | Buffer, options: BufferSourceOptions = {}) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
    this.chunkSize = options.chunkSize ?? Math.max(1, this.content.length);
    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new RangeError('Chunk size must be a positive integer');
    }
    this.meta = {
      fileName: options.fileName ?? 'buffer-input',
      fileSize: Buffer.byteLength(this.content),
      mimeType: options.mimeType ?? 'text/plain',
    };
  }

  async *read(): AsyncIterable<string> {
    for (let offset = 0; offset < this.content.length; offset += this.chunkSize) {
      yield await Promise.resolve(this.content.slice(offset, offset + this.chunkSize));
    }
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
