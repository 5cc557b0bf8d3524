import { CronService, type PayloadExecutor } from '@cronkeep/core';
import type { CronkeepConfig } from './config.ts';
import { createExecutor } from './executor.ts';

export function createService(config: CronkeepConfig, executor?: PayloadExecutor): CronService {
  return new CronService({
    storePath: config.storePath,
    defaultTimezone: config.timezone,
    tickIntervalMs: config.tickIntervalMs,
    jobTimeoutMs: config.jobTimeoutMs,
    hookTimeoutMs: config.hookTimeoutMs,
    executor: executor ?? createExecutor({ tasks: config.tasks }),
  });
}
