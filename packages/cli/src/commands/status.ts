import { stat } from 'node:fs/promises';
import { CronService, StoreCorruptError } from '@cronkeep/core';
import { loadConfig, resolveConfigPath } from '../config.ts';
import { bold, dim, green, red, banner } from '../utils/print.ts';

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export interface StatusResult {
  configPath: string;
  configExists: boolean;
  storePath: string;
  storeError: string | null;
  timezone: string;
  tasks: string[];
  jobs: number;
  enabledJobs: number;
  nextWakeAtMs: number | null;
}

export async function getStatus(configPath: string = resolveConfigPath()): Promise<StatusResult> {
  const config = await loadConfig(configPath);
  const result: StatusResult = {
    configPath,
    configExists: await fileExists(configPath),
    storePath: config.storePath,
    storeError: null,
    timezone: config.timezone,
    tasks: Object.keys(config.tasks),
    jobs: 0,
    enabledJobs: 0,
    nextWakeAtMs: null,
  };

  const service = new CronService({ storePath: config.storePath, defaultTimezone: config.timezone });
  try {
    await service.load();
  } catch (err) {
    if (err instanceof StoreCorruptError) {
      result.storeError = err.message;
      return result;
    }
    throw err;
  }

  const { jobs, enabledJobs, nextWakeAtMs } = service.status();
  return { ...result, jobs, enabledJobs, nextWakeAtMs };
}

export async function runStatus(): Promise<void> {
  banner('cronkeep status');

  const status = await getStatus();

  const configMark = status.configExists ? green('✓') : `${red('✗ not found')} ${dim('(using defaults)')}`;
  console.log(`Config:    ${status.configPath} ${configMark}`);
  console.log(`Store:     ${status.storePath}`);
  console.log(`Timezone:  ${status.timezone}`);
  console.log(`Tasks:     ${status.tasks.length > 0 ? status.tasks.join(', ') : dim('none')}`);

  if (status.storeError !== null) {
    console.log(`Jobs:      ${red(status.storeError)}`);
    return;
  }
  console.log(`Jobs:      ${status.enabledJobs} enabled / ${status.jobs} total`);
  const next = status.nextWakeAtMs === null ? dim('none') : new Date(status.nextWakeAtMs).toISOString();
  console.log(`Next run:  ${next}`);

  if (!status.configExists) {
    console.log(`\nRun ${bold('cronkeep init')} to write a config file.`);
  }
}
