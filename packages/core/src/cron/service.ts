import { randomBytes } from 'node:crypto';
import { HookRegistry } from '../hooks/registry.ts';
import { TimeoutError, withTimeout } from '../utils/timeout.ts';
import {
  ExecutionError,
  ExecutionTimeoutError,
  InvalidScheduleError,
  JobNotFoundError,
  errorMessage,
} from './errors.ts';
import { computeNextRun, validateSchedule } from './schedule.ts';
import { JsonFileJobStore, type JobStore } from './store.ts';
import { isValidTimezone, systemTimezone } from './timezone.ts';
import type {
  AddJobOptions,
  CronHookEvents,
  CronJob,
  CronPayload,
  CronServiceStatus,
  PayloadExecutor,
  RunEvent,
  UpdateJobPatch,
} from './types.ts';

export interface CronServiceOptions {
  /** Path of the JSON store file. Ignored when `store` is given. */
  storePath?: string;
  store?: JobStore;
  executor?: PayloadExecutor;
  /** IANA zone for jobs without their own. Default: the system zone */
  defaultTimezone?: string;
  /** Default: 1000 */
  tickIntervalMs?: number;
  /** Default: 5 minutes */
  jobTimeoutMs?: number;
  /** Default: 200 */
  hookTimeoutMs?: number;
  now?: () => number;
}

interface RunOutcome {
  job: CronJob;
  durationMs: number;
  error: string | null;
  timedOut: boolean;
}

const DEFAULT_TICK_INTERVAL_MS = 1000;
const DEFAULT_JOB_TIMEOUT_MS = 5 * 60 * 1000;

function cloneJob(job: CronJob): CronJob {
  return structuredClone(job);
}

function defaultJobName(payload: CronPayload): string {
  switch (payload.kind) {
    case 'message':
      // Never empty: the store reads an empty name back as the job id.
      return payload.message.trim().slice(0, 50) || 'message';
    case 'task_run':
      return `task ${payload.taskName}`;
  }
}

export class CronService {
  readonly hooks: HookRegistry<CronHookEvents>;
  readonly defaultTimezone: string;

  private jobs = new Map<string, CronJob>();
  private running = new Set<string>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private queue: Promise<void> = Promise.resolve();
  private inFlight = new Set<Promise<unknown>>();
  private store: JobStore;
  private executor?: PayloadExecutor;
  private tickIntervalMs: number;
  private jobTimeoutMs: number;
  private now: () => number;

  constructor(options: CronServiceOptions) {
    if (options.store) {
      this.store = options.store;
    } else if (options.storePath) {
      this.store = new JsonFileJobStore(options.storePath);
    } else {
      throw new Error('CronService needs either a store or a storePath');
    }

    this.defaultTimezone = options.defaultTimezone ?? systemTimezone();
    if (!isValidTimezone(this.defaultTimezone)) {
      throw new InvalidScheduleError(`Unknown timezone "${this.defaultTimezone}"`);
    }

    this.executor = options.executor;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.jobTimeoutMs = options.jobTimeoutMs ?? DEFAULT_JOB_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.hooks = new HookRegistry<CronHookEvents>({ timeoutMs: options.hookTimeoutMs });
  }

  /** Loads persisted jobs and starts the tick. StoreCorruptError propagates. */
  async start(): Promise<void> {
    await this.load();
    if (this.timer !== null) return;
    this.timer = setInterval(() => this.onTick(), this.tickIntervalMs);
  }

  async load(): Promise<void> {
    await this.serialize(async () => {
      const loaded = await this.store.load();
      const now = this.now();
      for (const job of loaded.values()) {
        if (!job.enabled) {
          job.state.nextRunAtMs = null;
        } else if (job.state.nextRunAtMs === null && job.schedule.kind !== 'at') {
          job.state.nextRunAtMs = this.nextRunFor(job, now);
        }
      }
      this.jobs = loaded;
    });
  }

  /** Stops ticking, waits for in-flight runs and drops all hooks. */
  async stop(): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await Promise.all([...this.inFlight]);
    await this.queue;
    this.hooks.clear();
  }

  async addJob(opts: AddJobOptions): Promise<CronJob> {
    return this.serialize(async () => {
      const now = this.now();
      const timezone = opts.timezone ?? this.defaultTimezone;
      const nextRunAtMs = this.initialNextRun(opts.schedule, now, timezone);

      const job: CronJob = {
        id: this.generateId(),
        name: opts.name.trim() || defaultJobName(opts.payload),
        enabled: true,
        schedule: opts.schedule,
        payload: opts.payload,
        deleteAfterRun: opts.deleteAfterRun ?? false,
        state: {
          nextRunAtMs,
          lastRunAtMs: null,
          lastStatus: 'never_run',
          lastError: null,
          lastDurationMs: null,
          runCount: 0,
        },
        createdAtMs: now,
        updatedAtMs: now,
      };
      if (opts.timezone !== undefined) job.timezone = opts.timezone;

      await this.commit((jobs) => jobs.set(job.id, cloneJob(job)));
      return cloneJob(job);
    });
  }

  async updateJob(jobId: string, patch: UpdateJobPatch): Promise<CronJob> {
    return this.serialize(async () => {
      const job = this.requireJob(jobId);
      const now = this.now();

      if (patch.name !== undefined) job.name = patch.name.trim() || job.name;
      if (patch.payload !== undefined) job.payload = patch.payload;
      if (patch.deleteAfterRun !== undefined) job.deleteAfterRun = patch.deleteAfterRun;

      const rescheduled = patch.schedule !== undefined || patch.timezone !== undefined;
      if (patch.schedule !== undefined) job.schedule = patch.schedule;
      if (patch.timezone === null) {
        delete job.timezone;
      } else if (patch.timezone !== undefined) {
        job.timezone = patch.timezone;
      }

      if (rescheduled) {
        const timezone = this.timezoneOf(job);
        if (job.enabled) {
          job.state.nextRunAtMs = this.initialNextRun(job.schedule, now, timezone);
        } else {
          validateSchedule(job.schedule, timezone);
          job.state.nextRunAtMs = null;
        }
      }

      job.updatedAtMs = now;
      await this.commit((jobs) => jobs.set(job.id, job));
      return cloneJob(job);
    });
  }

  async removeJob(jobId: string): Promise<CronJob> {
    return this.serialize(async () => {
      const job = this.requireJob(jobId);
      await this.commit((jobs) => jobs.delete(jobId));
      return job;
    });
  }

  async enableJob(jobId: string): Promise<CronJob> {
    return this.serialize(async () => {
      const job = this.requireJob(jobId);
      const now = this.now();
      job.state.nextRunAtMs = this.initialNextRun(job.schedule, now, this.timezoneOf(job));
      job.enabled = true;
      job.updatedAtMs = now;
      await this.commit((jobs) => jobs.set(job.id, job));
      return cloneJob(job);
    });
  }

  async disableJob(jobId: string): Promise<CronJob> {
    return this.serialize(async () => {
      const job = this.requireJob(jobId);
      job.enabled = false;
      job.state.nextRunAtMs = null;
      job.updatedAtMs = this.now();
      await this.commit((jobs) => jobs.set(job.id, job));
      return cloneJob(job);
    });
  }

  getJob(jobId: string): CronJob {
    const job = this.jobs.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return cloneJob(job);
  }

  listJobs(): CronJob[] {
    return [...this.jobs.values()].map(cloneJob);
  }

  status(): CronServiceStatus {
    let enabledJobs = 0;
    let nextWakeAtMs: number | null = null;
    for (const job of this.jobs.values()) {
      if (!job.enabled) continue;
      enabledJobs++;
      const next = job.state.nextRunAtMs;
      if (next !== null && (nextWakeAtMs === null || next < nextWakeAtMs)) {
        nextWakeAtMs = next;
      }
    }
    return {
      running: this.timer !== null,
      jobs: this.jobs.size,
      enabledJobs,
      nextWakeAtMs,
    };
  }

  /**
   * Dispatches every enabled job due at `now`, earliest first. Executor calls run
   * concurrently outside the store lock and each outcome is recorded as soon as
   * its executor settles; the tick persists once, after the last one.
   * Returns the dispatched job ids in dispatch order.
   */
  async runDue(now: number = this.now()): Promise<string[]> {
    const due = await this.serialize(async () => this.claimDueJobs(now));
    if (due.length === 0) return [];

    try {
      await Promise.all(due.map((job) => this.runJob(job, now)));
    } finally {
      for (const job of due) this.running.delete(job.id);
      await this.serialize(async () => this.persistTick());
    }

    return due.map((job) => job.id);
  }

  private async runJob(job: CronJob, now: number): Promise<void> {
    const outcome = await this.dispatch(job, now);
    try {
      await this.serialize(async () => this.recordOutcome(outcome, now));
    } finally {
      this.running.delete(job.id);
    }

    const event: RunEvent = {
      jobId: job.id,
      name: job.name,
      payloadKind: job.payload.kind,
      timestamp: now,
    };
    const runCount = job.state.runCount + 1;
    if (outcome.error === null) {
      await this.hooks.trigger('after_run', { ...event, durationMs: outcome.durationMs, runCount });
    } else {
      await this.hooks.trigger('run_failed', {
        ...event,
        durationMs: outcome.durationMs,
        runCount,
        error: outcome.error,
        timedOut: outcome.timedOut,
      });
    }
  }

  private onTick(): void {
    const tick: Promise<unknown> = this.runDue()
      .catch((err) => {
        console.error('[CronService] Tick failed:', err);
      })
      .finally(() => this.inFlight.delete(tick));
    this.inFlight.add(tick);
  }

  private claimDueJobs(now: number): CronJob[] {
    const due = [...this.jobs.values()]
      .filter(
        (job) =>
          job.enabled &&
          job.state.nextRunAtMs !== null &&
          job.state.nextRunAtMs <= now &&
          !this.running.has(job.id),
      )
      .sort((a, b) => {
        const byTime = (a.state.nextRunAtMs ?? 0) - (b.state.nextRunAtMs ?? 0);
        if (byTime !== 0) return byTime;
        return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
      });

    for (const job of due) this.running.add(job.id);
    return due.map(cloneJob);
  }

  private async dispatch(job: CronJob, now: number): Promise<RunOutcome> {
    await this.hooks.trigger('before_run', {
      jobId: job.id,
      name: job.name,
      payloadKind: job.payload.kind,
      timestamp: now,
    });

    const startedAt = Date.now();
    try {
      if (this.executor) {
        const executor = this.executor;
        await withTimeout(
          (signal) => executor(job.payload, { jobId: job.id, jobName: job.name, signal }),
          this.jobTimeoutMs,
        );
      }
      return { job, durationMs: Date.now() - startedAt, error: null, timedOut: false };
    } catch (err) {
      const timedOut = err instanceof TimeoutError;
      const failure = timedOut
        ? new ExecutionTimeoutError(this.jobTimeoutMs)
        : err instanceof ExecutionError
          ? err
          : new ExecutionError(errorMessage(err), { cause: err });
      return { job, durationMs: Date.now() - startedAt, error: failure.message, timedOut };
    }
  }

  /** Applies one run to the in-memory set; `persistTick` writes it. */
  private recordOutcome(outcome: RunOutcome, now: number): void {
    const current = this.jobs.get(outcome.job.id);
    // Removed while it was running.
    if (!current) return;

    const job = cloneJob(current);
    job.state.runCount += 1;
    job.state.lastRunAtMs = now;
    job.state.lastDurationMs = outcome.durationMs;
    job.state.lastStatus = outcome.error === null ? 'success' : 'failure';
    job.state.lastError = outcome.error;
    job.updatedAtMs = now;

    job.state.nextRunAtMs = job.enabled ? this.nextRunFor(job, now) : null;

    const next = new Map(this.jobs);
    if (job.schedule.kind === 'at' && job.state.nextRunAtMs === null) {
      if (job.deleteAfterRun) {
        next.delete(job.id);
        this.jobs = next;
        return;
      }
      job.enabled = false;
    }
    next.set(job.id, job);
    this.jobs = next;
  }

  private async persistTick(): Promise<void> {
    try {
      await this.store.save(this.jobs);
    } catch (err) {
      console.error('[CronService] Failed to save store:', err);
    }
  }

  /** Never throws: a schedule that stopped evaluating retires the job. */
  private nextRunFor(job: CronJob, now: number): number | null {
    try {
      return computeNextRun(job.schedule, now, this.timezoneOf(job));
    } catch (err) {
      console.error(`[CronService] Cannot schedule job ${job.id}: ${errorMessage(err)}`);
      return null;
    }
  }

  private initialNextRun(
    schedule: CronJob['schedule'],
    now: number,
    timezone: string,
  ): number {
    const next = computeNextRun(schedule, now, timezone);
    if (next === null) {
      throw new InvalidScheduleError(
        schedule.kind === 'at'
          ? `at timestamp ${new Date(schedule.atMs).toISOString()} is already in the past`
          : `schedule never fires: ${schedule.kind === 'cron' ? schedule.expr : schedule.kind}`,
      );
    }
    return next;
  }

  private timezoneOf(job: CronJob): string {
    return job.timezone ?? this.defaultTimezone;
  }

  private requireJob(jobId: string): CronJob {
    const job = this.jobs.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return cloneJob(job);
  }

  /** Persists a modified copy of the job set and only then swaps it in. */
  private async commit(mutate: (jobs: Map<string, CronJob>) => void): Promise<void> {
    const next = new Map(this.jobs);
    mutate(next);
    await this.store.save(next);
    this.jobs = next;
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private generateId(): string {
    let id: string;
    do {
      id = randomBytes(4).toString('hex');
    } while (this.jobs.has(id));
    return id;
  }
}
