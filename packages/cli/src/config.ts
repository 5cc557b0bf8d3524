import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { isValidTimezone, systemTimezone } from '@cronkeep/core';

export const CONFIG_DIR = join(homedir(), '.cronkeep');
export const CONFIG_PATH = join(CONFIG_DIR, 'config.json');

const TaskDefinitionSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
});

export const ConfigSchema = z.object({
  timezone: z
    .string()
    .default(() => systemTimezone())
    .refine(isValidTimezone, { message: 'unknown IANA timezone' }),
  storePath: z.string().min(1).default(join(CONFIG_DIR, 'jobs.json')),
  tickIntervalMs: z.number().int().positive().default(1000),
  jobTimeoutMs: z.number().int().positive().default(5 * 60 * 1000),
  hookTimeoutMs: z.number().int().positive().default(200),
  tasks: z.record(TaskDefinitionSchema).default({}),
});

export type TaskDefinition = z.infer<typeof TaskDefinitionSchema>;
export type CronkeepConfig = z.infer<typeof ConfigSchema>;

/** Replace `${VAR_NAME}` placeholders with `process.env.VAR_NAME` */
export function interpolateEnv(raw: string): string {
  return raw.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    return process.env[varName] ?? '';
  });
}

export function expandHome(p: string): string {
  if (p.startsWith('~/')) {
    return join(homedir(), p.slice(2));
  }
  return p;
}

export function parseConfig(input: unknown, source = 'config'): CronkeepConfig {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid config at ${source}:\n${issues}`);
  }
  const config = result.data;
  return {
    ...config,
    storePath: resolve(expandHome(config.storePath)),
    tasks: Object.fromEntries(
      Object.entries(config.tasks).map(([name, task]) => [
        name,
        task.cwd === undefined ? task : { ...task, cwd: resolve(expandHome(task.cwd)) },
      ]),
    ),
  };
}

/** Missing file means defaults; unreadable or invalid content throws. */
export async function loadConfig(path?: string): Promise<CronkeepConfig> {
  const configPath = path ?? process.env.CRONKEEP_CONFIG ?? CONFIG_PATH;
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return parseConfig({}, configPath);
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(interpolateEnv(raw));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Config at ${configPath} is not valid JSON: ${reason}`);
  }
  return parseConfig(json, configPath);
}

export function resolveConfigPath(): string {
  return process.env.CRONKEEP_CONFIG ?? CONFIG_PATH;
}
