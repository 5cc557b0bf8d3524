import type { CronHookEvents, HookRegistry } from '@cronkeep/core';

export class RunLog {
  private entries: string[] = [];

  constructor(
    private maxEntries = 500,
    private echo?: (line: string) => void,
  ) {}

  push(entry: string): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
    this.echo?.(entry);
  }

  tail(count: number): string[] {
    return this.entries.slice(-count);
  }

  failures(): string[] {
    return this.entries.filter((e) => e.includes(' run-failed: '));
  }

  static attach(
    hooks: HookRegistry<CronHookEvents>,
    echo?: (line: string) => void,
  ): RunLog {
    const log = new RunLog(500, echo);
    const ts = (ms: number) => new Date(ms).toISOString().slice(11, 19);

    hooks.register('before_run', (e) => {
      log.push(`[${ts(e.timestamp)}] run-start: ${e.name} (${e.jobId})`);
    });
    hooks.register('after_run', (e) => {
      log.push(`[${ts(e.timestamp)}] run-finish: ${e.name} (${e.jobId}, ${e.durationMs}ms, run ${e.runCount})`);
    });
    hooks.register('run_failed', (e) => {
      const reason = e.timedOut ? 'timeout' : 'error';
      log.push(`[${ts(e.timestamp)}] run-failed: ${e.name} (${e.jobId}, ${reason}) ${e.error}`);
    });

    return log;
  }
}
