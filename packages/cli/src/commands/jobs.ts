import {
  CronError,
  formatJob,
  type CronPayload,
  type CronSchedule,
  type CronService,
} from '@cronkeep/core';
import { loadConfig } from '../config.ts';
import { createService } from '../service.ts';
import { UsageError, getFlag, getFlags, hasFlag, parseSeconds } from '../utils/args.ts';
import { green, red } from '../utils/print.ts';

export type JobsService = Pick<
  CronService,
  'addJob' | 'listJobs' | 'removeJob' | 'enableJob' | 'disableJob'
>;

export type JobCommand = 'list' | 'add' | 'remove' | 'enable' | 'disable';

function parseSchedule(args: string[], now: number): { schedule: CronSchedule; oneShot: boolean } {
  const every = parseSeconds(getFlag(args, '--every'), '--every');
  const expr = getFlag(args, '--cron');
  const at = getFlag(args, '--at');
  const delay = parseSeconds(getFlag(args, '--in'), '--in');

  const given = [every, expr, at, delay].filter((v) => v !== undefined).length;
  if (given !== 1) {
    throw new UsageError('add needs exactly one of --every, --cron, --at or --in');
  }

  if (every !== undefined) return { schedule: { kind: 'every', everyMs: every * 1000 }, oneShot: false };
  if (expr !== undefined) return { schedule: { kind: 'cron', expr }, oneShot: false };
  if (delay !== undefined) return { schedule: { kind: 'at', atMs: now + delay * 1000 }, oneShot: true };

  const atMs = Date.parse(at ?? '');
  if (Number.isNaN(atMs)) {
    throw new UsageError(`--at expects an ISO datetime, got "${at}"`);
  }
  return { schedule: { kind: 'at', atMs }, oneShot: hasFlag(args, '--delete-after-run') };
}

function parsePayload(args: string[]): CronPayload {
  const message = getFlag(args, '--message', '-m');
  const task = getFlag(args, '--task');
  if ((message === undefined) === (task === undefined)) {
    throw new UsageError('add needs exactly one of --message or --task');
  }

  const target: { channel?: string; to?: string } = {};
  const channel = getFlag(args, '--channel');
  const to = getFlag(args, '--to');
  if (channel !== undefined) target.channel = channel;
  if (to !== undefined) target.to = to;

  if (task !== undefined) {
    const taskArgs = getFlags(args, '--arg');
    return taskArgs.length > 0
      ? { kind: 'task_run', taskName: task, args: taskArgs, ...target }
      : { kind: 'task_run', taskName: task, ...target };
  }
  return { kind: 'message', message: message ?? '', ...target };
}

function requireId(command: JobCommand, args: string[]): string {
  const id = args.find((arg) => !arg.startsWith('-'));
  if (!id) throw new UsageError(`${command} needs a job id`);
  return id;
}

/** Runs one job command against `service` and returns the text to print. */
export async function executeJobCommand(
  service: JobsService,
  command: JobCommand,
  args: string[],
  now: number = Date.now(),
): Promise<string> {
  switch (command) {
    case 'list': {
      const jobs = service.listJobs();
      const shown = hasFlag(args, '--all') ? jobs : jobs.filter((job) => job.enabled);
      if (shown.length === 0) return 'No scheduled jobs';
      return shown.map(formatJob).join('\n');
    }
    case 'add': {
      const { schedule, oneShot } = parseSchedule(args, now);
      const job = await service.addJob({
        name: getFlag(args, '--name') ?? '',
        schedule,
        payload: parsePayload(args),
        timezone: getFlag(args, '--tz'),
        deleteAfterRun: oneShot,
      });
      return `Job added: ${job.id} (${job.name})`;
    }
    case 'remove': {
      const job = await service.removeJob(requireId(command, args));
      return `Job ${job.id} removed (${job.name})`;
    }
    case 'enable': {
      const job = await service.enableJob(requireId(command, args));
      return `Job ${job.id} enabled`;
    }
    case 'disable': {
      const job = await service.disableJob(requireId(command, args));
      return `Job ${job.id} disabled`;
    }
  }
}

export async function runJobs(command: JobCommand, args: string[]): Promise<void> {
  try {
    const config = await loadConfig();
    const service = createService(config);
    await service.load();
    const output = await executeJobCommand(service, command, args);
    console.log(command === 'list' ? output : green(output));
  } catch (err) {
    if (err instanceof CronError || err instanceof UsageError) {
      console.error(red(`Error: ${err.message}`));
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}
