export type CronSchedule =
  | { kind: 'at'; atMs: number }
  | { kind: 'every'; everyMs: number }
  | { kind: 'cron'; expr: string };

export type ScheduleKind = CronSchedule['kind'];

/** Where a fired job's output should land, e.g. a chat channel and recipient. */
export interface DeliveryTarget {
  channel?: string;
  to?: string;
}

export interface MessagePayload extends DeliveryTarget {
  kind: 'message';
  message: string;
}

export interface TaskRunPayload extends DeliveryTarget {
  kind: 'task_run';
  taskName: string;
  args?: string[];
}

export type CronPayload = MessagePayload | TaskRunPayload;

export type PayloadKind = CronPayload['kind'];

export type RunStatus = 'success' | 'failure' | 'never_run';

export interface CronJobState {
  /** null once the job can no longer fire (disabled or exhausted one-shot). */
  nextRunAtMs: number | null;
  lastRunAtMs: number | null;
  lastStatus: RunStatus;
  lastError: string | null;
  lastDurationMs: number | null;
  runCount: number;
}

export interface CronJob {
  id: string;
  name: string;
  enabled: boolean;
  schedule: CronSchedule;
  payload: CronPayload;
  /** IANA zone; the service default applies when absent. */
  timezone?: string;
  /** One-shot jobs are removed instead of retired after they fire. */
  deleteAfterRun: boolean;
  state: CronJobState;
  createdAtMs: number;
  updatedAtMs: number;
}

export interface AddJobOptions {
  name: string;
  schedule: CronSchedule;
  payload: CronPayload;
  timezone?: string;
  deleteAfterRun?: boolean;
}

export interface UpdateJobPatch {
  name?: string;
  schedule?: CronSchedule;
  payload?: CronPayload;
  /** null clears the override. */
  timezone?: string | null;
  deleteAfterRun?: boolean;
}

export interface ExecutionContext {
  jobId: string;
  jobName: string;
  /** Aborted when the job exceeds its execution timeout. */
  signal: AbortSignal;
}

/** Host-supplied capability that performs a job's payload. Throwing marks the run as failed. */
export type PayloadExecutor = (payload: CronPayload, context: ExecutionContext) => Promise<void> | void;

export interface RunEvent {
  jobId: string;
  name: string;
  payloadKind: PayloadKind;
  timestamp: number;
}

export interface RunSucceededEvent extends RunEvent {
  durationMs: number;
  runCount: number;
}

export interface RunFailedEvent extends RunEvent {
  durationMs: number;
  runCount: number;
  error: string;
  timedOut: boolean;
}

export type CronHookEvents = {
  before_run: RunEvent;
  after_run: RunSucceededEvent;
  run_failed: RunFailedEvent;
};

export interface CronServiceStatus {
  running: boolean;
  jobs: number;
  enabledJobs: number;
  nextWakeAtMs: number | null;
}
