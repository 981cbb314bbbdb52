import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { InMemoryStateStore } from '../../../src/infrastructure/state/InMemoryStateStore.js';
import { FileStateStore } from '../../../src/infrastructure/state/FileStateStore.js';
import { IntegrityError, ValidationError } from '../../../src/domain/errors/PipelineErrors.js';
import { describeStateStoreContract } from '../../helpers/stateStoreContract.js';
import { makeBatches, makeJob } from '../../helpers/fixtures.js';

describeStateStoreContract('InMemoryStateStore', {
  create: () => new InMemoryStateStore(),
});

let contractDir = '';
describeStateStoreContract('FileStateStore', {
  async create() {
    contractDir = await mkdtemp(join(tmpdir(), 'scrapeflow-state-'));
    return new FileStateStore({ directory: contractDir });
  },
  async destroy() {
    await rm(contractDir, { recursive: true, force: true });
  },
});

describe('FileStateStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'scrapeflow-state-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should survive a restart by reading state back from disk', async () => {
    const first = new FileStateStore({ directory: dir });
    await first.createJob(makeJob('job-1'), makeBatches('job-1', 2));
    await first.transitionJob('job-1', ['PENDING'], 'RUNNING');
    await first.claimBatch('job-1', 'w-1');
    await first.completeBatch('job-1', 'job-1:000000', 'w-1', { outputRef: 'out-0', recordCount: 4 });

    const second = new FileStateStore({ directory: dir });

    expect((await second.getJob('job-1'))?.status).toBe('RUNNING');
    expect(await second.getCompletedBatchIds('job-1')).toEqual(['job-1:000000']);
    expect((await second.getBatch('job-1', 'job-1:000001'))?.status).toBe('PENDING');
  });

  it('should keep one file per job and no temporary files', async () => {
    const store = new FileStateStore({ directory: dir });
    await store.createJob(makeJob('job-1'), makeBatches('job-1', 1));
    await store.createJob(makeJob('job-2'), makeBatches('job-2', 1));
    await store.transitionJob('job-1', ['PENDING'], 'RUNNING');

    expect((await readdir(dir)).sort()).toEqual(['job-1.json', 'job-2.json']);
  });

  it('should list no jobs when the directory does not exist yet', async () => {
    const store = new FileStateStore({ directory: join(dir, 'missing') });
    expect(await store.listJobs()).toEqual([]);
  });

  it('should raise an integrity error for a corrupt state file', async () => {
    await writeFile(join(dir, 'job-1.json'), '{"job": {"id": "job-1"', 'utf-8');
    const store = new FileStateStore({ directory: dir });

    await expect(store.getJob('job-1')).rejects.toThrow(IntegrityError);
  });

  it('should refuse job ids that name a file outside its directory', async () => {
    await writeFile(join(dir, 'escape.json'), '{}', 'utf-8');
    const store = new FileStateStore({ directory: join(dir, 'state') });

    await expect(store.getJob('../escape')).rejects.toThrow(
      "Job id '../escape' does not name a file in the state directory",
    );
    await expect(store.createJob(makeJob('../escape'), [])).rejects.toThrow(ValidationError);
    expect(await readdir(dir)).toEqual(['escape.json']);
  });
});
