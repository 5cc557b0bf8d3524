import { randomBytes } from 'node:crypto';
import { dirname } from 'node:path';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { StoreCorruptError } from './errors.ts';
import type { CronJob } from './types.ts';

export const STORE_VERSION = 2;

export interface JobStore {
  load(): Promise<Map<string, CronJob>>;
  save(jobs: ReadonlyMap<string, CronJob>): Promise<void>;
}

const scheduleSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('at'), atMs: z.number() }),
  z.object({ kind: z.literal('every'), everyMs: z.number() }),
  z.object({ kind: z.literal('cron'), expr: z.string() }),
]);

const target = {
  channel: z.string().optional(),
  to: z.string().optional(),
};

const payloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('message'), message: z.string(), ...target }),
  z.object({
    kind: z.literal('task_run'),
    taskName: z.string().min(1),
    args: z.array(z.string()).optional(),
    ...target,
  }),
]);

const nullableNumber = z.number().nullable().default(null).catch(null);

const stateSchema = z
  .object({
    nextRunAtMs: nullableNumber,
    lastRunAtMs: nullableNumber,
    lastStatus: z.enum(['success', 'failure', 'never_run']).default('never_run').catch('never_run'),
    lastError: z.string().nullable().default(null).catch(null),
    lastDurationMs: nullableNumber,
    runCount: z.number().int().nonnegative().default(0).catch(0),
  })
  .default({});

const recordSchema = z.object({
  name: z.string().default(''),
  enabled: z.boolean().default(true).catch(true),
  schedule: scheduleSchema,
  payload: payloadSchema,
  timezone: z.string().min(1).optional().catch(undefined),
  deleteAfterRun: z.boolean().default(false).catch(false),
  state: stateSchema,
  createdAtMs: z.number().default(0).catch(0),
  updatedAtMs: z.number().default(0).catch(0),
});

type StoredRecord = z.infer<typeof recordSchema>;

const LEGACY_STATUS: Record<string, string> = {
  ok: 'success',
  error: 'failure',
  skipped: 'never_run',
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Rewrites records from the array-based v1 layout into the current shape. */
function migrateLegacyRecord(raw: Record<string, unknown>): Record<string, unknown> {
  const record = { ...raw };

  if (isObject(record.schedule)) {
    const { tz, ...schedule } = record.schedule;
    record.schedule = schedule;
    if (record.timezone === undefined && typeof tz === 'string' && tz) {
      record.timezone = tz;
    }
  }

  if (isObject(record.payload)) {
    const kind = record.payload.kind;
    if (kind === 'agent_turn' || kind === 'direct_deliver') {
      const { deliver: _deliver, ...rest } = record.payload;
      record.payload = { ...rest, kind: 'message' };
    }
  }

  if (isObject(record.state)) {
    const state = { ...record.state };
    if (typeof state.lastStatus === 'string' && state.lastStatus in LEGACY_STATUS) {
      state.lastStatus = LEGACY_STATUS[state.lastStatus];
    }
    record.state = state;
  }

  return record;
}

function toJob(id: string, record: StoredRecord): CronJob {
  const job: CronJob = {
    id,
    name: record.name || id,
    enabled: record.enabled,
    schedule: record.schedule,
    payload: record.payload,
    deleteAfterRun: record.deleteAfterRun,
    state: record.state,
    createdAtMs: record.createdAtMs,
    updatedAtMs: record.updatedAtMs,
  };
  if (record.timezone !== undefined) job.timezone = record.timezone;
  return job;
}

function toRecord(job: CronJob): Omit<CronJob, 'id'> {
  const { id: _id, ...record } = job;
  return record;
}

/**
 * Single-file JSON store. Writes go to a temp file that is renamed over the
 * target, so readers never observe a partial file.
 */
export class JsonFileJobStore implements JobStore {
  constructor(readonly path: string) {}

  async load(): Promise<Map<string, CronJob>> {
    let data: string;
    try {
      data = await readFile(this.path, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return new Map();
      throw err;
    }
    return this.parse(data);
  }

  async save(jobs: ReadonlyMap<string, CronJob>): Promise<void> {
    const file = {
      version: STORE_VERSION,
      jobs: Object.fromEntries([...jobs].map(([id, job]) => [id, toRecord(job)])),
    };

    await mkdir(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
    try {
      await writeFile(tmpPath, JSON.stringify(file, null, 2) + '\n', 'utf-8');
      await rename(tmpPath, this.path);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }
  }

  private parse(data: string): Map<string, CronJob> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (err) {
      throw new StoreCorruptError(this.path, 'invalid JSON', { cause: err });
    }

    if (!isObject(parsed)) {
      throw new StoreCorruptError(this.path, 'top-level value is not an object');
    }

    const entries = this.rawEntries(parsed.jobs ?? {});
    const jobs = new Map<string, CronJob>();
    for (const [id, raw] of entries) {
      if (jobs.has(id)) {
        throw new StoreCorruptError(this.path, `duplicate job id "${id}"`);
      }
      const result = recordSchema.safeParse(migrateLegacyRecord(raw));
      if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue ? `${issue.path.join('.')}: ${issue.message}` : result.error.message;
        throw new StoreCorruptError(this.path, `job "${id}" is invalid (${where})`, {
          cause: result.error,
        });
      }
      jobs.set(id, toJob(id, result.data));
    }
    return jobs;
  }

  private rawEntries(jobs: unknown): Array<[string, Record<string, unknown>]> {
    // v1 kept an array of records carrying their own id.
    if (Array.isArray(jobs)) {
      return jobs.map((raw, index): [string, Record<string, unknown>] => {
        if (!isObject(raw) || typeof raw.id !== 'string' || !raw.id) {
          throw new StoreCorruptError(this.path, `job at index ${index} has no id`);
        }
        return [raw.id, raw];
      });
    }

    if (!isObject(jobs)) {
      throw new StoreCorruptError(this.path, '"jobs" is neither a mapping nor a list');
    }

    return Object.entries(jobs).map(([id, raw]): [string, Record<string, unknown>] => {
      if (!isObject(raw)) {
        throw new StoreCorruptError(this.path, `job "${id}" is not an object`);
      }
      return [id, raw];
    });
  }
}
