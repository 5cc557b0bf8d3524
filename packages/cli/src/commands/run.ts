import { loadConfig } from '../config.ts';
import { RunLog } from '../run-log.ts';
import { createService } from '../service.ts';
import { banner, dim } from '../utils/print.ts';

export async function runScheduler(): Promise<void> {
  const config = await loadConfig();
  const service = createService(config);
  RunLog.attach(service.hooks, (line) => console.log(dim(line)));

  await service.start();

  const status = service.status();
  banner('cronkeep scheduler');
  console.log(`Store:     ${config.storePath}`);
  console.log(`Timezone:  ${config.timezone}`);
  console.log(`Jobs:      ${status.enabledJobs} enabled / ${status.jobs} total`);
  if (status.nextWakeAtMs !== null) {
    console.log(`Next run:  ${new Date(status.nextWakeAtMs).toISOString()}`);
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      console.log(dim('\n[cronkeep] Shutting down...'));
      service.stop().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error('[cronkeep] Shutdown failed:', err);
          process.exit(1);
        },
      );
    });
  }
}
