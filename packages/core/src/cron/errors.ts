export type CronErrorCode =
  | 'invalid_schedule'
  | 'job_not_found'
  | 'store_corrupt'
  | 'execution_failed'
  | 'execution_timeout';

export class CronError extends Error {
  constructor(
    public code: CronErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CronError';
  }
}

export class InvalidScheduleError extends CronError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalid_schedule', message, options);
    this.name = 'InvalidScheduleError';
  }
}

export class JobNotFoundError extends CronError {
  constructor(public jobId: string) {
    super('job_not_found', `Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
  }
}

export class StoreCorruptError extends CronError {
  constructor(
    public path: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super('store_corrupt', `Job store at ${path} is unreadable: ${reason}`, options);
    this.name = 'StoreCorruptError';
  }
}

export class ExecutionError extends CronError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('execution_failed', message, options);
    this.name = 'ExecutionError';
  }
}

export class ExecutionTimeoutError extends CronError {
  constructor(public timeoutMs: number) {
    super('execution_timeout', `Timed out after ${timeoutMs}ms`);
    this.name = 'ExecutionTimeoutError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
