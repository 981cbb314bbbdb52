import { describe, it, expect } from 'vitest';
import { BatchSplitter } from '../../../src/domain/services/BatchSplitter.js';
import type { TargetGroup } from '../../../src/domain/services/BatchSplitter.js';
import type { Target } from '../../../src/domain/model/Target.js';

function urls(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `https://example.test/item/${String(i)}`);
}

async function collect(groups: AsyncIterable<TargetGroup>): Promise<TargetGroup[]> {
  const result: TargetGroup[] = [];
  for await (const group of groups) {
    result.push(group);
  }
  return result;
}

async function* streamed(items: readonly Target[]): AsyncIterable<Target> {
  for (const item of items) {
    await Promise.resolve();
    yield item;
  }
}

describe('BatchSplitter', () => {
  it('should split 25,000 targets into 10,000 + 10,000 + 5,000', async () => {
    const groups = await collect(new BatchSplitter(10_000).split(urls(25_000)));

    expect(groups.map((g) => g.targets.length)).toEqual([10_000, 10_000, 5_000]);
    expect(groups.map((g) => g.batchIndex)).toEqual([0, 1, 2]);
    expect(groups.map((g) => g.firstTargetIndex)).toEqual([0, 10_000, 20_000]);
  });

  it('should yield nothing for an empty input', async () => {
    const groups = await collect(new BatchSplitter(10).split([]));
    expect(groups).toEqual([]);
  });

  it('should yield a single group when the input is smaller than the batch size', async () => {
    const groups = await collect(new BatchSplitter(10).split(['a', 'b', 'c']));

    expect(groups).toEqual([{ targets: ['a', 'b', 'c'], batchIndex: 0, firstTargetIndex: 0 }]);
  });

  it('should not yield a trailing empty group when the input is an exact multiple', async () => {
    const groups = await collect(new BatchSplitter(2).split(['a', 'b', 'c', 'd']));

    expect(groups.map((g) => g.targets)).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
  });

  it('should preserve target order across groups', async () => {
    const input = urls(7);
    const groups = await collect(new BatchSplitter(3).split(input));

    expect(groups.flatMap((g) => g.targets)).toEqual(input);
  });

  it('should accept async iterables', async () => {
    const groups = await collect(new BatchSplitter(2).split(streamed(['a', 'b', 'c'])));

    expect(groups.map((g) => g.targets.length)).toEqual([2, 1]);
  });

  it('should start numbering at the given index', async () => {
    const groups = await collect(new BatchSplitter(2).split(['a', 'b', 'c'], 5));
    expect(groups.map((g) => g.batchIndex)).toEqual([5, 6]);
  });

  it('should keep structured targets as they are', async () => {
    const row = { url: 'https://example.test/a', sku: 'A-1' };
    const groups = await collect(new BatchSplitter(5).split([row]));

    expect(groups[0]?.targets[0]).toBe(row);
  });

  it('should reject a batch size that is not a positive integer', () => {
    expect(() => new BatchSplitter(0)).toThrow(RangeError);
    expect(() => new BatchSplitter(-1)).toThrow(RangeError);
    expect(() => new BatchSplitter(2.5)).toThrow('Batch size must be a positive integer');
  });
});
