import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { JsonFileJobStore, STORE_VERSION } from '../../src/cron/store.ts';
import { StoreCorruptError } from '../../src/cron/errors.ts';
import type { CronJob } from '../../src/cron/types.ts';

function makeJob(overrides: Partial<CronJob> = {}): CronJob {
  return {
    id: 'a1b2c3d4',
    name: 'backup',
    enabled: true,
    schedule: { kind: 'every', everyMs: 60_000 },
    payload: { kind: 'task_run', taskName: 'backup', args: ['--full'] },
    deleteAfterRun: false,
    state: {
      nextRunAtMs: 1_700_000_060_000,
      lastRunAtMs: null,
      lastStatus: 'never_run',
      lastError: null,
      lastDurationMs: null,
      runCount: 0,
    },
    createdAtMs: 1_700_000_000_000,
    updatedAtMs: 1_700_000_000_000,
    ...overrides,
  };
}

describe('JsonFileJobStore', () => {
  let tempDir: string;
  let storePath: string;
  let store: JsonFileJobStore;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'cronkeep-store-'));
    storePath = join(tempDir, 'jobs.json');
    store = new JsonFileJobStore(storePath);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should load an empty set when the file does not exist', async () => {
    const jobs = await store.load();
    expect(jobs.size).toBe(0);
  });

  it('should round-trip every field', async () => {
    const recurring = makeJob();
    const oneShot = makeJob({
      id: 'e5f6a7b8',
      name: 'reminder',
      enabled: false,
      schedule: { kind: 'at', atMs: 1_700_000_300_000 },
      payload: { kind: 'message', message: 'stand-up', channel: 'telegram', to: '42' },
      timezone: 'Asia/Shanghai',
      deleteAfterRun: true,
      state: {
        nextRunAtMs: null,
        lastRunAtMs: 1_700_000_300_000,
        lastStatus: 'failure',
        lastError: 'boom',
        lastDurationMs: 12,
        runCount: 3,
      },
    });

    await store.save(new Map([[recurring.id, recurring], [oneShot.id, oneShot]]));
    const loaded = await store.load();

    expect([...loaded.keys()]).toEqual(['a1b2c3d4', 'e5f6a7b8']);
    expect(loaded.get('a1b2c3d4')).toEqual(recurring);
    expect(loaded.get('e5f6a7b8')).toEqual(oneShot);
  });

  it('should write a versioned mapping keyed by job id', async () => {
    await store.save(new Map([['a1b2c3d4', makeJob()]]));

    const file = JSON.parse(await readFile(storePath, 'utf-8'));
    expect(file.version).toBe(STORE_VERSION);
    expect(Object.keys(file.jobs)).toEqual(['a1b2c3d4']);
    expect(file.jobs.a1b2c3d4.id).toBeUndefined();
    expect(file.jobs.a1b2c3d4.schedule).toEqual({ kind: 'every', everyMs: 60_000 });
  });

  it('should leave no temp files behind', async () => {
    await store.save(new Map([['a1b2c3d4', makeJob()]]));
    await store.save(new Map());

    expect(await readdir(tempDir)).toEqual(['jobs.json']);
  });

  it('should create missing parent directories', async () => {
    const nested = new JsonFileJobStore(join(tempDir, 'a', 'b', 'jobs.json'));
    await nested.save(new Map([['a1b2c3d4', makeJob()]]));

    expect((await nested.load()).size).toBe(1);
  });

  it('should fill defaults for missing fields', async () => {
    await writeFile(
      storePath,
      JSON.stringify({
        version: 2,
        jobs: {
          x1: {
            schedule: { kind: 'cron', expr: '0 9 * * *' },
            payload: { kind: 'message', message: 'hi' },
          },
        },
      }),
    );

    const job = (await store.load()).get('x1');
    expect(job).toEqual({
      id: 'x1',
      name: 'x1',
      enabled: true,
      schedule: { kind: 'cron', expr: '0 9 * * *' },
      payload: { kind: 'message', message: 'hi' },
      deleteAfterRun: false,
      state: {
        nextRunAtMs: null,
        lastRunAtMs: null,
        lastStatus: 'never_run',
        lastError: null,
        lastDurationMs: null,
        runCount: 0,
      },
      createdAtMs: 0,
      updatedAtMs: 0,
    });
  });

  it('should fall back to defaults for malformed state fields', async () => {
    await writeFile(
      storePath,
      JSON.stringify({
        jobs: {
          x1: {
            schedule: { kind: 'every', everyMs: 1000 },
            payload: { kind: 'message', message: 'hi' },
            state: { runCount: 'many', lastStatus: 'exploded', lastRunAtMs: 5 },
          },
        },
      }),
    );

    const state = (await store.load()).get('x1')?.state;
    expect(state?.runCount).toBe(0);
    expect(state?.lastStatus).toBe('never_run');
    expect(state?.lastRunAtMs).toBe(5);
  });

  it('should migrate the array-based v1 layout', async () => {
    await writeFile(
      storePath,
      JSON.stringify({
        version: 1,
        jobs: [
          {
            id: 'old1',
            name: 'legacy',
            enabled: true,
            schedule: { kind: 'cron', expr: '0 9 * * *', tz: 'Asia/Shanghai' },
            payload: { kind: 'agent_turn', message: 'hi', deliver: true, channel: 'telegram', to: '42' },
            state: { lastStatus: 'ok', runCount: 3 },
          },
        ],
      }),
    );

    const job = (await store.load()).get('old1');
    expect(job?.timezone).toBe('Asia/Shanghai');
    expect(job?.schedule).toEqual({ kind: 'cron', expr: '0 9 * * *' });
    expect(job?.payload).toEqual({ kind: 'message', message: 'hi', channel: 'telegram', to: '42' });
    expect(job?.state.lastStatus).toBe('success');
    expect(job?.state.runCount).toBe(3);
  });

  describe('corrupt files', () => {
    it('should reject invalid JSON', async () => {
      await writeFile(storePath, '{ not json');
      await expect(store.load()).rejects.toThrow(
        `Job store at ${storePath} is unreadable: invalid JSON`,
      );
    });

    it('should reject a record with an unknown schedule kind', async () => {
      await writeFile(
        storePath,
        JSON.stringify({
          jobs: {
            x1: {
              schedule: { kind: 'sometimes' },
              payload: { kind: 'message', message: 'hi' },
            },
          },
        }),
      );
      const error = await store.load().catch((err: unknown) => err);
      expect(error).toBeInstanceOf(StoreCorruptError);
      expect(error).toHaveProperty('code', 'store_corrupt');
      expect(error).toHaveProperty('path', storePath);
    });

    it('should reject duplicate ids in the legacy list', async () => {
      const record = {
        id: 'dup',
        schedule: { kind: 'every', everyMs: 1000 },
        payload: { kind: 'message', message: 'hi' },
      };
      await writeFile(storePath, JSON.stringify({ version: 1, jobs: [record, record] }));
      await expect(store.load()).rejects.toThrow('duplicate job id "dup"');
    });

    it('should reject a non-object top level', async () => {
      await writeFile(storePath, '[]');
      await expect(store.load()).rejects.toThrow('top-level value is not an object');
    });
  });
});
