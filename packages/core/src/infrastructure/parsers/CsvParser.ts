import Papa from 'papaparse';
import type { TargetParser } from '../../domain/ports/TargetParser.js';
import type { Target } from '../../domain/model/Target.js';
import { ValidationError } from '../../domain/errors/PipelineErrors.js';

export interface CsvParserOptions {
  /** Column delimiter. Default: auto-detected by PapaParse. */
  readonly delimiter?: string;
  /** First row holds column names; rows become objects. Default: `true`. */
  readonly hasHeader?: boolean;
  /**
   * Yield only this column's value as a bare identifier instead of the whole
   * row. Requires `hasHeader`.
   */
  readonly column?: string;
}

/**
 * CSV parser adapter using PapaParse.
 *
 * Chunks are joined before parsing so quoted fields may span chunk
 * boundaries. Empty rows are skipped.
 */
export class CsvParser implements TargetParser {
  private readonly options: CsvParserOptions;

  constructor(options?: CsvParserOptions) {
    this.options = { hasHeader: true, ...options };
    if (this.options.column !== undefined && !this.options.hasHeader) {
      throw new ValidationError('CsvParser: `column` requires `hasHeader`');
    }
  }

  async *parse(chunks: AsyncIterable<string | Buffer>): AsyncIterable<Target> {
    let content = '';
    for await (const chunk of chunks) {
      content += typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
    }

    if (this.options.hasHeader) {
      const result = Papa.parse<Record<string, string>>(content, {
        header: true,
        delimiter: this.options.delimiter ?? '',
        skipEmptyLines: 'greedy',
        dynamicTyping: false,
        transformHeader: (header) => header.trim(),
      });
      this.assertParsed(result.errors);
      yield* this.fromRows(result.data);
      return;
    }

    const result = Papa.parse<string[]>(content, {
      header: false,
      delimiter: this.options.delimiter ?? '',
      skipEmptyLines: 'greedy',
      dynamicTyping: false,
    });
    this.assertParsed(result.errors);
    for (const row of result.data) {
      const first = row[0]?.trim();
      if (first) yield first;
    }
  }

  private *fromRows(rows: readonly Record<string, string>[]): Iterable<Target> {
    const column = this.options.column;
    for (const row of rows) {
      if (column === undefined) {
        yield row;
        continue;
      }
      const value = row[column]?.trim();
      if (value) yield value;
    }
  }

  private assertParsed(errors: readonly Papa.ParseError[]): void {
    const fatal = errors.filter((e) => e.type === 'Quotes');
    if (fatal.length > 0) {
      const issues = fatal.map((e) => `row ${String(e.row ?? '?')}: ${e.message}`);
      throw new ValidationError('CSV input is malformed', issues);
    }
  }
}
