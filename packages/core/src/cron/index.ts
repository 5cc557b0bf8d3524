export { CronService, type CronServiceOptions } from './service.ts';
export { JsonFileJobStore, STORE_VERSION, type JobStore } from './store.ts';
export {
  computeNextRun,
  describeSchedule,
  nextCronOccurrence,
  parseCronExpression,
  validateSchedule,
  type CronFields,
} from './schedule.ts';
export { fromWallClock, isValidTimezone, systemTimezone, toWallClock, type WallClock } from './timezone.ts';
export { describePayload, formatJob } from './format.ts';
export {
  CronError,
  ExecutionError,
  ExecutionTimeoutError,
  InvalidScheduleError,
  JobNotFoundError,
  StoreCorruptError,
  errorMessage,
  type CronErrorCode,
} from './errors.ts';
export type * from './types.ts';
