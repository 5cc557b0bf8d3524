import { describeSchedule } from './schedule.ts';
import type { CronJob, CronPayload } from './types.ts';

function formatInstant(ms: number | null): string {
  return ms === null ? 'none' : new Date(ms).toISOString();
}

export function describePayload(payload: CronPayload): string {
  const target = payload.channel ? ` -> ${payload.channel}:${payload.to ?? '-'}` : '';
  switch (payload.kind) {
    case 'message':
      return `message${target}`;
    case 'task_run': {
      const args = payload.args?.length ? ` ${payload.args.join(' ')}` : '';
      return `task ${payload.taskName}${args}${target}`;
    }
  }
}

/** One-line summary, e.g. `[a1b2c3d4] backup | enabled | every 60s | next: ... | last: success (3 runs)`. */
export function formatJob(job: CronJob): string {
  const tz = job.timezone ? ` (${job.timezone})` : '';
  const runs = job.state.runCount === 1 ? '1 run' : `${job.state.runCount} runs`;
  return [
    `[${job.id}] ${job.name}`,
    job.enabled ? 'enabled' : 'disabled',
    `${describeSchedule(job.schedule)}${tz}`,
    describePayload(job.payload),
    `next: ${formatInstant(job.state.nextRunAtMs)}`,
    `last: ${job.state.lastStatus} (${runs})`,
  ].join(' | ');
}
