import { z } from 'zod';
import type { AgentTool } from './base.ts';
import type { CronService } from '../cron/service.ts';
import { CronError } from '../cron/errors.ts';
import { formatJob } from '../cron/format.ts';
import type { CronPayload, CronSchedule } from '../cron/types.ts';

export const cronToolParameters = z.object({
  action: z.enum(['add', 'list', 'remove', 'enable', 'disable']).describe('The action to perform'),
  name: z.string().optional().describe('Short label for the job (for add)'),
  message: z.string().optional().describe('Message to deliver when the job fires (for add)'),
  task_name: z.string().optional().describe('Named task to run when the job fires, instead of a message (for add)'),
  task_args: z.array(z.string()).optional().describe('Arguments passed to the task (for add with task_name)'),
  every_seconds: z.number().int().positive().optional().describe('Run every N seconds'),
  cron_expr: z.string().optional().describe("Cron expression like '0 9 * * *'"),
  tz: z.string().optional().describe('IANA timezone for the job, e.g. "Asia/Shanghai"'),
  in_seconds: z.number().int().positive().optional().describe('Run once after N seconds'),
  at: z.string().optional().describe('ISO datetime for a one-time run'),
  job_id: z.string().optional().describe('Job ID (for remove, enable, disable)'),
});

export type CronToolParams = z.infer<typeof cronToolParameters>;

type CronToolService = Pick<CronService, 'addJob' | 'listJobs' | 'removeJob' | 'enableJob' | 'disableJob'>;

function buildSchedule(params: CronToolParams): { schedule: CronSchedule; oneShot: boolean } | string {
  const provided = [params.every_seconds, params.cron_expr, params.in_seconds, params.at].filter(
    (v) => v !== undefined,
  );
  if (provided.length !== 1) {
    return 'Error: exactly one of every_seconds, cron_expr, in_seconds or at is required for add';
  }

  if (params.every_seconds !== undefined) {
    return { schedule: { kind: 'every', everyMs: params.every_seconds * 1000 }, oneShot: false };
  }
  if (params.cron_expr !== undefined) {
    return { schedule: { kind: 'cron', expr: params.cron_expr }, oneShot: false };
  }
  if (params.in_seconds !== undefined) {
    return { schedule: { kind: 'at', atMs: Date.now() + params.in_seconds * 1000 }, oneShot: true };
  }

  const atMs = Date.parse(params.at ?? '');
  if (Number.isNaN(atMs)) {
    return 'Error: invalid datetime format for "at"';
  }
  return { schedule: { kind: 'at', atMs }, oneShot: true };
}

export function createCronTool(service: CronToolService): AgentTool<typeof cronToolParameters> {
  return {
    name: 'cron',
    description:
      'Schedule reminders and recurring tasks. ' +
      'Give a message to deliver it as-is, or task_name to run a named task. ' +
      'Actions: add, list, remove, enable, disable.',
    parameters: cronToolParameters,
    execute: async (params, context) => {
      try {
        switch (params.action) {
          case 'add': {
            if (!params.message && !params.task_name) {
              return 'Error: message or task_name is required for add';
            }
            const built = buildSchedule(params);
            if (typeof built === 'string') return built;

            const target = { channel: context.channel, to: context.chatId };
            const payload: CronPayload = params.task_name
              ? { kind: 'task_run', taskName: params.task_name, args: params.task_args, ...target }
              : { kind: 'message', message: params.message ?? '', ...target };

            const job = await service.addJob({
              name: params.name ?? '',
              schedule: built.schedule,
              payload,
              timezone: params.tz,
              deleteAfterRun: built.oneShot,
            });
            return `Job added: ${job.id} (${job.name})`;
          }

          case 'list': {
            const jobs = service.listJobs();
            if (jobs.length === 0) return 'No scheduled jobs';
            return jobs.map(formatJob).join('\n');
          }

          case 'remove':
          case 'enable':
          case 'disable': {
            if (!params.job_id) {
              return `Error: job_id is required for ${params.action} action`;
            }
            if (params.action === 'remove') {
              await service.removeJob(params.job_id);
              return `Job ${params.job_id} removed`;
            }
            const job =
              params.action === 'enable'
                ? await service.enableJob(params.job_id)
                : await service.disableJob(params.job_id);
            return `Job ${job.id} ${job.enabled ? 'enabled' : 'disabled'}`;
          }

          default:
            return 'Error: unknown action';
        }
      } catch (err) {
        if (err instanceof CronError) return `Error: ${err.message}`;
        throw err;
      }
    },
  };
}
