import type { Target } from '../model/Target.js';

/** One group of targets produced by the splitter. */
export interface TargetGroup {
  readonly targets: readonly Target[];
  readonly batchIndex: number;
  /** Position of the group's first target in the whole input. */
  readonly firstTargetIndex: number;
}

/**
 * Domain service that groups a stream of targets into fixed-size batches.
 *
 * Pure logic, no I/O. Operates as an async generator that yields groups as
 * they fill up, so the whole input is never held in memory.
 */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError('Batch size must be a positive integer');
    }
  }

  /**
   * Split a stream of targets into groups of `batchSize`.
   *
   * The final group may contain fewer targets. Indices start at `startIndex`
   * and increase by one with no gaps.
   */
  async *split(targets: AsyncIterable<Target> | Iterable<Target>, startIndex = 0): AsyncIterable<TargetGroup> {
    let buffer: Target[] = [];
    let batchIndex = startIndex;
    let position = 0;

    for await (const target of targets) {
      buffer.push(target);

      if (buffer.length >= this.batchSize) {
        yield { targets: buffer, batchIndex, firstTargetIndex: position };
        position += buffer.length;
        buffer = [];
        batchIndex++;
      }
    }

    if (buffer.length > 0) {
      yield { targets: buffer, batchIndex, firstTargetIndex: position };
    }
  }
}
