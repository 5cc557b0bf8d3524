import { systemTimezone } from '@cronkeep/core';

export interface ConfigTemplate {
  timezone: string;
  storePath: string;
  tickIntervalMs: number;
  jobTimeoutMs: number;
  hookTimeoutMs: number;
  tasks: Record<string, { command: string; args: string[] }>;
}

export function defaultConfig(overrides: { timezone?: string } = {}): ConfigTemplate {
  return {
    timezone: overrides.timezone ?? systemTimezone(),
    storePath: '~/.cronkeep/jobs.json',
    tickIntervalMs: 1000,
    jobTimeoutMs: 5 * 60 * 1000,
    hookTimeoutMs: 200,
    tasks: {
      hello: { command: 'echo', args: ['hello from cronkeep'] },
    },
  };
}
