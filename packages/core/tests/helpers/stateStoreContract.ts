import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { StateStore } from '../../src/domain/ports/StateStore.js';
import { InvalidJobStateError, ValidationError } from '../../src/domain/errors/PipelineErrors.js';
import { makeBatches, makeJob } from './fixtures.js';

export interface StateStoreHarness {
  create(): Promise<StateStore> | StateStore;
  destroy?(): Promise<void> | void;
}

/** Behaviour every `StateStore` implementation must share. */
export function describeStateStoreContract(name: string, harness: StateStoreHarness): void {
  describe(`${name} (StateStore contract)`, () => {
    let store: StateStore;

    beforeEach(async () => {
      store = await harness.create();
    });

    afterEach(async () => {
      await harness.destroy?.();
    });

    async function runningJob(jobId: string, batchCount = 3, maxRetries = 2): Promise<void> {
      await store.createJob(makeJob(jobId, { totalBatches: batchCount, maxRetries }), makeBatches(jobId, batchCount, maxRetries));
      await store.transitionJob(jobId, ['PENDING'], 'RUNNING', { startedAt: 1_700_000_000_500 });
    }

    describe('jobs', () => {
      it('should create and read back a job with its batches in index order', async () => {
        await store.createJob(
          makeJob('job-1', { owner: 'ops@example.test', metadata: { campaign: 'spring' } }),
          makeBatches('job-1', 3).reverse(),
        );

        const job = await store.getJob('job-1');
        expect(job?.status).toBe('PENDING');
        expect(job?.owner).toBe('ops@example.test');
        expect(job?.metadata).toEqual({ campaign: 'spring' });

        const stored = await store.getBatches('job-1');
        expect(stored.map((b) => b.index)).toEqual([0, 1, 2]);
        expect(stored.map((b) => b.status)).toEqual(['PENDING', 'PENDING', 'PENDING']);
        expect(stored[1]?.firstTargetIndex).toBe(10);
      });

      it('should return null and empty results for an unknown job', async () => {
        expect(await store.getJob('missing')).toBeNull();
        expect(await store.getBatches('missing')).toEqual([]);
        expect(await store.getBatch('missing', 'missing:000000')).toBeNull();
        expect(await store.claimBatch('missing', 'w-1')).toEqual({ claimed: false, reason: 'JOB_NOT_FOUND' });
      });

      it('should reject a duplicate job id', async () => {
        await store.createJob(makeJob('job-1'), makeBatches('job-1', 1));
        await expect(store.createJob(makeJob('job-1'), makeBatches('job-1', 1))).rejects.toThrow(ValidationError);
      });

      it('should reject a job with two batches at the same index', async () => {
        const [first] = makeBatches('job-1', 1);
        const batches = first ? [first, { ...first, id: 'job-1:other' }] : [];

        await expect(store.createJob(makeJob('job-1'), batches)).rejects.toThrow(ValidationError);
        expect(await store.getJob('job-1')).toBeNull();
      });

      it('should apply a transition only from the expected status', async () => {
        await store.createJob(makeJob('job-1'), makeBatches('job-1', 1));

        expect(await store.transitionJob('job-1', ['PENDING'], 'RUNNING', { startedAt: 42 })).toBe(true);
        expect(await store.transitionJob('job-1', ['PENDING'], 'RUNNING')).toBe(false);

        const job = await store.getJob('job-1');
        expect(job?.status).toBe('RUNNING');
        expect(job?.startedAt).toBe(42);
      });

      it('should record the failure and completion time of a failed job', async () => {
        await runningJob('job-1');

        await store.transitionJob('job-1', ['RUNNING'], 'FAILED', {
          completedAt: 99,
          failure: { code: 'PERMANENT', message: 'HTTP 404', batchId: 'job-1:000002', batchIndex: 2 },
        });

        const job = await store.getJob('job-1');
        expect(job?.status).toBe('FAILED');
        expect(job?.completedAt).toBe(99);
        expect(job?.failure).toEqual({ code: 'PERMANENT', message: 'HTTP 404', batchId: 'job-1:000002', batchIndex: 2 });
      });

      it('should refuse transitions the lifecycle does not allow', async () => {
        await store.createJob(makeJob('job-1'), makeBatches('job-1', 1));

        await expect(store.transitionJob('job-1', ['PENDING'], 'COMPLETED')).rejects.toThrow(InvalidJobStateError);
        expect((await store.getJob('job-1'))?.status).toBe('PENDING');
      });

      it('should list jobs newest first with filters', async () => {
        await store.createJob(makeJob('job-a', { createdAt: 1000, owner: 'alice' }), makeBatches('job-a', 1));
        await store.createJob(makeJob('job-b', { createdAt: 2000, owner: 'bob' }), makeBatches('job-b', 1));
        await store.createJob(makeJob('job-c', { createdAt: 3000, owner: 'alice' }), makeBatches('job-c', 1));
        await store.transitionJob('job-c', ['PENDING'], 'RUNNING');

        expect((await store.listJobs()).map((j) => j.id)).toEqual(['job-c', 'job-b', 'job-a']);
        expect((await store.listJobs({ owner: 'alice' })).map((j) => j.id)).toEqual(['job-c', 'job-a']);
        expect((await store.listJobs({ status: 'PENDING' })).map((j) => j.id)).toEqual(['job-b', 'job-a']);
        expect((await store.listJobs({ limit: 1 })).map((j) => j.id)).toEqual(['job-c']);
      });

      it('should archive only terminal jobs and hide them from listings', async () => {
        await runningJob('job-1');
        expect(await store.archiveJob('job-1')).toBe(false);

        await store.transitionJob('job-1', ['RUNNING'], 'CANCELLED', { completedAt: 5 });
        expect(await store.archiveJob('job-1')).toBe(true);

        expect(await store.listJobs()).toEqual([]);
        expect((await store.listJobs({ includeArchived: true })).map((j) => j.id)).toEqual(['job-1']);
        expect(await store.archiveJob('missing')).toBe(false);
      });
    });

    describe('claims', () => {
      it('should not hand out batches of a job that is not running', async () => {
        await store.createJob(makeJob('job-1'), makeBatches('job-1', 1));
        expect(await store.claimBatch('job-1', 'w-1')).toEqual({ claimed: false, reason: 'JOB_NOT_RUNNING' });
      });

      it('should claim the lowest pending batch first', async () => {
        await runningJob('job-1');

        const first = await store.claimBatch('job-1', 'w-1');
        const second = await store.claimBatch('job-1', 'w-2');

        expect(first.claimed && first.batch.index).toBe(0);
        expect(second.claimed && second.batch.index).toBe(1);
        expect(first.claimed && first.batch.attemptCount).toBe(1);
        expect(first.claimed && first.batch.workerId).toBe('w-1');
      });

      it('should claim a specific batch at most once', async () => {
        await runningJob('job-1');

        const first = await store.claimBatch('job-1', 'w-1', { batchId: 'job-1:000001' });
        const second = await store.claimBatch('job-1', 'w-2', { batchId: 'job-1:000001' });

        expect(first.claimed).toBe(true);
        expect(second).toEqual({ claimed: false, reason: 'BATCH_NOT_CLAIMABLE' });
        expect(await store.claimBatch('job-1', 'w-2', { batchId: 'job-1:999999' })).toEqual({
          claimed: false,
          reason: 'BATCH_NOT_FOUND',
        });
      });

      it('should give every batch to exactly one of many concurrent claimers', async () => {
        await runningJob('job-1', 5);

        const results = await Promise.all(Array.from({ length: 20 }, (_, i) => store.claimBatch('job-1', `w-${String(i)}`)));
        const claimedIds = results.flatMap((r) => (r.claimed ? [r.batch.id] : []));

        expect(claimedIds).toHaveLength(5);
        expect(new Set(claimedIds).size).toBe(5);
        expect(results.filter((r) => !r.claimed).every((r) => !r.claimed && r.reason === 'NO_PENDING_BATCHES')).toBe(true);
        expect((await store.getBatchCounts('job-1')).claimed).toBe(5);
      });

      it('should report when no batch is left to claim', async () => {
        await runningJob('job-1', 1);
        await store.claimBatch('job-1', 'w-1');

        expect(await store.claimBatch('job-1', 'w-2')).toEqual({ claimed: false, reason: 'NO_PENDING_BATCHES' });
      });
    });

    describe('batch outcomes', () => {
      it('should complete a batch held by the worker', async () => {
        await runningJob('job-1', 1);
        await store.claimBatch('job-1', 'w-1');

        const ok = await store.completeBatch('job-1', 'job-1:000000', 'w-1', {
          outputRef: 'job-1/outputs/batch_000000.json',
          recordCount: 8,
        });

        expect(ok).toBe(true);
        const batch = await store.getBatch('job-1', 'job-1:000000');
        expect(batch?.status).toBe('COMPLETED');
        expect(batch?.outputRef).toBe('job-1/outputs/batch_000000.json');
        expect(batch?.recordCount).toBe(8);
        expect(await store.getCompletedBatchIds('job-1')).toEqual(['job-1:000000']);
      });

      it('should ignore a completion from a worker that does not hold the claim', async () => {
        await runningJob('job-1', 1);
        await store.claimBatch('job-1', 'w-1');

        const ok = await store.completeBatch('job-1', 'job-1:000000', 'w-2', { outputRef: 'x', recordCount: 1 });

        expect(ok).toBe(false);
        expect((await store.getBatch('job-1', 'job-1:000000'))?.status).toBe('CLAIMED');
      });

      it('should return a failed attempt to pending with a backoff', async () => {
        await runningJob('job-1', 1);
        await store.claimBatch('job-1', 'w-1');

        const failed = await store.failBatch('job-1', 'job-1:000000', 'w-1', {
          error: 'HTTP 503',
          permanent: false,
          retryDelayMs: 60_000,
        });

        expect(failed?.status).toBe('PENDING');
        expect(failed?.lastError).toBe('HTTP 503');
        expect(failed?.attemptCount).toBe(1);

        const retry = await store.claimBatch('job-1', 'w-1', { batchId: 'job-1:000000' });
        expect(retry.claimed).toBe(false);
        expect(!retry.claimed && retry.reason).toBe('BATCH_BACKING_OFF');
        expect(await store.claimBatch('job-1', 'w-1')).toEqual({ claimed: false, reason: 'NO_PENDING_BATCHES' });
      });

      it('should fail the batch once its attempts are used up', async () => {
        await runningJob('job-1', 1, 1);

        for (let attempt = 1; attempt <= 2; attempt++) {
          const claim = await store.claimBatch('job-1', 'w-1', { batchId: 'job-1:000000' });
          expect(claim.claimed).toBe(true);
          await store.failBatch('job-1', 'job-1:000000', 'w-1', { error: 'timeout', permanent: false, retryDelayMs: 0 });
        }

        const batch = await store.getBatch('job-1', 'job-1:000000');
        expect(batch?.status).toBe('FAILED');
        expect(batch?.attemptCount).toBe(2);
        expect(await store.claimBatch('job-1', 'w-1', { batchId: 'job-1:000000' })).toEqual({
          claimed: false,
          reason: 'BATCH_NOT_CLAIMABLE',
        });
      });

      it('should fail the batch at once on a permanent error', async () => {
        await runningJob('job-1', 1);
        await store.claimBatch('job-1', 'w-1');

        const failed = await store.failBatch('job-1', 'job-1:000000', 'w-1', {
          error: 'HTTP 404',
          permanent: true,
          retryDelayMs: 0,
        });

        expect(failed?.status).toBe('FAILED');
        expect(failed?.attemptCount).toBe(1);
      });

      it('should ignore a failure from a worker that does not hold the claim', async () => {
        await runningJob('job-1', 1);
        await store.claimBatch('job-1', 'w-1');

        expect(
          await store.failBatch('job-1', 'job-1:000000', 'w-2', { error: 'x', permanent: true, retryDelayMs: 0 }),
        ).toBeNull();
      });
    });

    describe('recovery', () => {
      it('should release claims older than the timeout', async () => {
        await runningJob('job-1', 2);
        await store.claimBatch('job-1', 'w-1');

        expect(await store.reclaimStaleBatches('job-1', 3_600_000)).toBe(0);
        expect(await store.reclaimStaleBatches('job-1', 0)).toBe(1);

        const batch = await store.getBatch('job-1', 'job-1:000000');
        expect(batch?.status).toBe('PENDING');
        expect(batch?.attemptCount).toBe(1);
        expect(batch?.lastError).toBe("Claim by worker 'w-1' expired");
      });

      it('should count batches by status', async () => {
        await runningJob('job-1', 3);
        await store.claimBatch('job-1', 'w-1');
        await store.completeBatch('job-1', 'job-1:000000', 'w-1', { outputRef: 'out', recordCount: 1 });
        await store.claimBatch('job-1', 'w-1');

        expect(await store.getBatchCounts('job-1')).toEqual({
          total: 3,
          pending: 1,
          claimed: 1,
          completed: 1,
          failed: 0,
          settled: false,
        });
      });
    });
  });
}
