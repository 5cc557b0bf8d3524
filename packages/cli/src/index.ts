#!/usr/bin/env tsx
import { printUsage } from './utils/print.ts';

const [command, ...rest] = process.argv.slice(2);

switch (command) {
  case 'init': {
    const { runInit } = await import('./commands/init.ts');
    await runInit(rest);
    break;
  }
  case 'status': {
    const { runStatus } = await import('./commands/status.ts');
    await runStatus();
    break;
  }
  case 'list':
  case 'add':
  case 'remove':
  case 'enable':
  case 'disable': {
    const { runJobs } = await import('./commands/jobs.ts');
    await runJobs(command, rest);
    break;
  }
  case 'run': {
    const { runScheduler } = await import('./commands/run.ts');
    await runScheduler();
    break;
  }
  default:
    printUsage();
    break;
}
