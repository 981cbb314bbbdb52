import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { QueryTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import { IntegrityError } from '@scrapeflow/core';
import { SequelizeStateStore } from '../../src/SequelizeStateStore.js';
import { describeStateStoreContract } from '../../../core/tests/helpers/stateStoreContract.js';
import { makeBatches, makeJob } from '../../../core/tests/helpers/fixtures.js';
import { connect, removeDatabase, tempDatabasePath } from '../helpers.js';

let contractDb: { sequelize: Sequelize; path: string } | null = null;

describeStateStoreContract('SequelizeStateStore', {
  async create() {
    const path = tempDatabasePath();
    const sequelize = connect(path);
    contractDb = { sequelize, path };
    const store = new SequelizeStateStore(sequelize);
    await store.initialize();
    return store;
  },
  async destroy() {
    if (!contractDb) return;
    await contractDb.sequelize.close();
    await removeDatabase(contractDb.path);
    contractDb = null;
  },
});

describe('SequelizeStateStore', () => {
  let dbPath: string;
  let sequelize: Sequelize;
  let store: SequelizeStateStore;

  beforeEach(async () => {
    dbPath = tempDatabasePath();
    sequelize = connect(dbPath);
    store = new SequelizeStateStore(sequelize);
    await store.initialize();
  });

  afterEach(async () => {
    await sequelize.close();
    await removeDatabase(dbPath);
  });

  async function runningJob(jobId: string, batchCount: number): Promise<void> {
    await store.createJob(makeJob(jobId, { totalBatches: batchCount }), makeBatches(jobId, batchCount));
    await store.transitionJob(jobId, ['PENDING'], 'RUNNING', { startedAt: 1_700_000_000_500 });
  }

  describe('initialize', () => {
    it('should be idempotent', async () => {
      await expect(store.initialize()).resolves.toBeUndefined();
      await expect(store.initialize()).resolves.toBeUndefined();
    });

    it('should name the tables after the prefix', async () => {
      const prefixed = new SequelizeStateStore(sequelize, { tablePrefix: 'crawl' });
      await prefixed.initialize();

      const tables = await sequelize.getQueryInterface().showAllTables();
      expect([...tables].sort()).toEqual(['crawl_batches', 'crawl_jobs', 'scrapeflow_batches', 'scrapeflow_jobs']);
    });
  });

  describe('persistence', () => {
    it('should read back jobs and claims through a new connection', async () => {
      await runningJob('job-1', 2);
      await store.claimBatch('job-1', 'w-1');
      await sequelize.close();

      sequelize = connect(dbPath);
      store = new SequelizeStateStore(sequelize);
      await store.initialize();

      const job = await store.getJob('job-1');
      expect(job?.status).toBe('RUNNING');
      expect(job?.startedAt).toBe(1_700_000_000_500);
      expect(job?.createdAt).toBe(1_700_000_000_000);

      const batch = await store.getBatch('job-1', 'job-1:000000');
      expect(batch?.status).toBe('CLAIMED');
      expect(batch?.workerId).toBe('w-1');
      expect(typeof batch?.claimedAt).toBe('number');
      expect(batch?.availableAt).toBeUndefined();
    });

    it('should bump the row version on every batch write', async () => {
      await runningJob('job-1', 1);
      await store.claimBatch('job-1', 'w-1');
      await store.completeBatch('job-1', 'job-1:000000', 'w-1', { outputRef: 'out', recordCount: 3 });

      const rows = await sequelize.query<{ version: number }>(
        'SELECT version FROM scrapeflow_batches WHERE id = :id',
        { type: QueryTypes.SELECT, replacements: { id: 'job-1:000000' } },
      );
      expect(rows).toEqual([{ version: 2 }]);
    });

    it('should clear claim columns when a batch is completed', async () => {
      await runningJob('job-1', 1);
      await store.claimBatch('job-1', 'w-1');
      await store.completeBatch('job-1', 'job-1:000000', 'w-1', { outputRef: 'out', recordCount: 3 });

      const rows = await sequelize.query<{ workerId: string | null; claimedAt: number | null }>(
        'SELECT workerId, claimedAt FROM scrapeflow_batches WHERE id = :id',
        { type: QueryTypes.SELECT, replacements: { id: 'job-1:000000' } },
      );
      expect(rows).toEqual([{ workerId: null, claimedAt: null }]);
    });

    it('should reject a row whose status it does not know', async () => {
      await store.createJob(makeJob('job-1'), makeBatches('job-1', 1));
      await sequelize.query("UPDATE scrapeflow_jobs SET status = 'PAUSED' WHERE id = 'job-1'");

      await expect(store.getJob('job-1')).rejects.toThrow(IntegrityError);
    });
  });

  describe('shared database', () => {
    it('should give every batch to one store only when two connections claim at once', async () => {
      await runningJob('job-1', 4);
      const otherSequelize = connect(dbPath);
      const other = new SequelizeStateStore(otherSequelize);

      try {
        const results = await Promise.all(
          Array.from({ length: 10 }, (_, i) => (i % 2 === 0 ? store : other).claimBatch('job-1', `w-${String(i)}`)),
        );
        const claimedIds = results.flatMap((r) => (r.claimed ? [r.batch.id] : []));

        expect(new Set(claimedIds).size).toBe(4);
        expect(claimedIds).toHaveLength(4);
      } finally {
        await otherSequelize.close();
      }
    });

    it('should let only one writer win a race on the same claim', async () => {
      await runningJob('job-1', 1);
      await store.claimBatch('job-1', 'w-1');

      const [completed, failed] = await Promise.all([
        store.completeBatch('job-1', 'job-1:000000', 'w-1', { outputRef: 'out', recordCount: 1 }),
        store.failBatch('job-1', 'job-1:000000', 'w-1', { error: 'late', permanent: true, retryDelayMs: 0 }),
      ]);

      const batch = await store.getBatch('job-1', 'job-1:000000');
      expect(completed !== (failed !== null)).toBe(true);
      expect(batch?.status).toBe(completed ? 'COMPLETED' : 'FAILED');
    });
  });
});
