import type { JobStore } from '../../src/cron/store.ts';
import type { CronJob } from '../../src/cron/types.ts';

/** In-process store that records every save. */
export class MemoryJobStore implements JobStore {
  saves = 0;
  failNextSave = false;

  constructor(private jobs = new Map<string, CronJob>()) {}

  async load(): Promise<Map<string, CronJob>> {
    return structuredClone(this.jobs);
  }

  async save(jobs: ReadonlyMap<string, CronJob>): Promise<void> {
    if (this.failNextSave) {
      this.failNextSave = false;
      throw new Error('disk full');
    }
    this.saves++;
    this.jobs = structuredClone(new Map(jobs));
  }

  snapshot(): Map<string, CronJob> {
    return structuredClone(this.jobs);
  }
}
