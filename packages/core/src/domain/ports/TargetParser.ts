import type { Target } from '../model/Target.js';

/** Port for turning a stream of raw text chunks into ordered targets. */
export interface TargetParser {
  parse(chunks: AsyncIterable<string | Buffer>): AsyncIterable<Target>;
}
