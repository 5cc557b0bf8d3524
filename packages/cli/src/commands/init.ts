import { mkdir, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { resolveConfigPath } from '../config.ts';
import { defaultConfig } from '../templates/config.ts';
import { getFlag, hasFlag } from '../utils/args.ts';
import { bold, dim, green } from '../utils/print.ts';

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/** Writes the default config unless one exists. Returns whether it wrote. */
export async function writeDefaultConfig(
  path: string,
  options: { force?: boolean; timezone?: string } = {},
): Promise<boolean> {
  if (!options.force && (await fileExists(path))) return false;
  await mkdir(dirname(path), { recursive: true });
  const config = defaultConfig({ timezone: options.timezone });
  await writeFile(path, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  return true;
}

export async function runInit(args: string[]): Promise<void> {
  const path = resolveConfigPath();
  const written = await writeDefaultConfig(path, {
    force: hasFlag(args, '--force'),
    timezone: getFlag(args, '--tz'),
  });

  if (written) {
    console.log(`  ${green('+')} ${path}`);
    console.log(`\nAdd a job with ${bold('cronkeep add')}, then start it with ${bold('cronkeep run')}.`);
  } else {
    console.log(`  ${dim('-')} ${path} ${dim('(already exists, use --force to overwrite)')}`);
  }
}
