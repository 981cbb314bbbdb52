import { describe, it, expect, vi, afterEach } from 'vitest';
import { InMemoryTaskQueue } from '../../../src/infrastructure/queue/InMemoryTaskQueue.js';
import type { BatchTask } from '../../../src/domain/ports/TaskQueue.js';

function task(jobId: string, batchIndex: number): BatchTask {
  return { jobId, batchId: `${jobId}:${String(batchIndex).padStart(6, '0')}`, batchIndex, enqueuedAt: 0 };
}

describe('InMemoryTaskQueue', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should hand out tasks in FIFO order', async () => {
    const queue = new InMemoryTaskQueue();
    await queue.enqueue(task('job-1', 0));
    await queue.enqueue(task('job-1', 1));

    expect((await queue.dequeue())?.batchIndex).toBe(0);
    expect((await queue.dequeue())?.batchIndex).toBe(1);
    expect(queue.size()).toBe(0);
  });

  it('should wake a waiting consumer when a task arrives', async () => {
    const queue = new InMemoryTaskQueue();
    const waiting = queue.dequeue();

    await queue.enqueue(task('job-1', 4));

    expect(await waiting).toEqual(task('job-1', 4));
  });

  it('should release a waiting consumer with null when aborted', async () => {
    const queue = new InMemoryTaskQueue();
    const controller = new AbortController();
    const waiting = queue.dequeue(controller.signal);

    controller.abort();

    expect(await waiting).toBeNull();
    await queue.enqueue(task('job-1', 0));
    expect(queue.size()).toBe(1);
  });

  it('should hold delayed tasks back until their delay has passed', async () => {
    vi.useFakeTimers();
    const queue = new InMemoryTaskQueue();
    await queue.enqueue(task('job-1', 0), { delayMs: 1000 });
    await queue.enqueue(task('job-1', 1));

    expect(queue.size()).toBe(2);
    expect((await queue.dequeue())?.batchIndex).toBe(1);

    const waiting = queue.dequeue();
    vi.advanceTimersByTime(999);
    vi.advanceTimersByTime(1);

    expect((await waiting)?.batchIndex).toBe(0);
  });

  it('should drop every ready and delayed task of a job', async () => {
    vi.useFakeTimers();
    const queue = new InMemoryTaskQueue();
    await queue.enqueue(task('job-1', 0));
    await queue.enqueue(task('job-2', 0));
    await queue.enqueue(task('job-1', 1), { delayMs: 500 });

    expect(await queue.drop('job-1')).toBe(2);
    expect(queue.size()).toBe(1);

    vi.advanceTimersByTime(1000);
    expect((await queue.dequeue())?.jobId).toBe('job-2');
    expect(queue.size()).toBe(0);
  });

  it('should release consumers and refuse tasks once closed', async () => {
    const queue = new InMemoryTaskQueue();
    const waiting = queue.dequeue();

    queue.close();

    expect(await waiting).toBeNull();
    expect(await queue.dequeue()).toBeNull();
    await expect(queue.enqueue(task('job-1', 0))).rejects.toThrow('Task queue is closed');
  });
});
