import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { ExecutionError, type CronPayload, type PayloadExecutor } from '@cronkeep/core';
import type { TaskDefinition } from './config.ts';

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_LENGTH = 10000;

export interface CommandRequest {
  command: string;
  args: string[];
  cwd?: string;
  signal: AbortSignal;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (request: CommandRequest) => Promise<CommandResult>;

export interface ExecutorOptions {
  tasks: Record<string, TaskDefinition>;
  /** Receives delivered messages and task output. Default: console.log */
  log?: (line: string) => void;
  runCommand?: CommandRunner;
}

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength) + `\n... [truncated, ${text.length} total chars]`;
}

export const runCommand: CommandRunner = async ({ command, args, cwd, signal }) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    cwd,
    signal,
    encoding: 'utf8',
    env: { ...process.env },
    maxBuffer: 1024 * 1024,
  });
  return { stdout, stderr };
};

function target(payload: CronPayload): string {
  return payload.channel ? ` -> ${payload.channel}:${payload.to ?? '-'}` : '';
}

/**
 * Executor for the CLI host: messages are written to the log, `task_run`
 * payloads run the named command from the config's task table.
 */
export function createExecutor(options: ExecutorOptions): PayloadExecutor {
  const log = options.log ?? ((line: string) => console.log(line));
  const run = options.runCommand ?? runCommand;

  return async (payload, context) => {
    switch (payload.kind) {
      case 'message':
        log(`[cronkeep] ${context.jobName}${target(payload)}: ${payload.message}`);
        return;
      case 'task_run': {
        const task = Object.hasOwn(options.tasks, payload.taskName)
          ? options.tasks[payload.taskName]
          : undefined;
        if (!task) {
          throw new ExecutionError(`Unknown task "${payload.taskName}"`);
        }

        const args = [...task.args, ...(payload.args ?? [])];
        let result: CommandResult;
        try {
          result = await run({ command: task.command, args, cwd: task.cwd, signal: context.signal });
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          throw new ExecutionError(`Task "${payload.taskName}" failed: ${reason}`, { cause: err });
        }

        const output = result.stdout.trim();
        if (output) {
          log(`[cronkeep] ${context.jobName}${target(payload)}: ${truncate(output, MAX_OUTPUT_LENGTH)}`);
        }
        return;
      }
      default: {
        const unknown: never = payload;
        throw new ExecutionError(`Unsupported payload: ${JSON.stringify(unknown)}`);
      }
    }
  };
}
