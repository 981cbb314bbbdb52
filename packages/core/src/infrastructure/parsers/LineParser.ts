import type { TargetParser } from '../../domain/ports/TargetParser.js';

export interface LineParserOptions {
  /** Trim surrounding whitespace from each line. Default: `true`. */
  readonly trim?: boolean;
  /** Lines starting with this prefix are ignored. Default: none. */
  readonly commentPrefix?: string;
}

/**
 * Parser for inputs holding one identifier per line. Blank lines are skipped.
 * Lines split across chunk boundaries are reassembled.
 */
export class LineParser implements TargetParser {
  private readonly trim: boolean;
  private readonly commentPrefix: string | undefined;

  constructor(options?: LineParserOptions) {
    this.trim = options?.trim ?? true;
    this.commentPrefix = options?.commentPrefix;
  }

  async *parse(chunks: AsyncIterable<string | Buffer>): AsyncIterable<string> {
    let carry = '';
    for await (const chunk of chunks) {
      const text = carry + (typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
      const lines = text.split(/\r?\n/);
      carry = lines.pop() ?? '';
      for (const line of lines) {
        const target = this.toTarget(line);
        if (target !== null) yield target;
      }
    }
    const last = this.toTarget(carry);
    if (last !== null) yield last;
  }

  private toTarget(line: string): string | null {
    const value = this.trim ? line.trim() : line.replace(/\r$/, '');
    if (value === '') return null;
    if (this.commentPrefix !== undefined && value.startsWith(this.commentPrefix)) return null;
    return value;
  }
}
