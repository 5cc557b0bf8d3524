import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir, tmpdir } from 'node:os';
import { systemTimezone } from '@cronkeep/core';
import { expandHome, interpolateEnv, loadConfig, parseConfig } from '../src/config.ts';

describe('config', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'cronkeep-config-'));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should apply defaults to an empty object', () => {
    expect(parseConfig({})).toEqual({
      timezone: systemTimezone(),
      storePath: join(homedir(), '.cronkeep', 'jobs.json'),
      tickIntervalMs: 1000,
      jobTimeoutMs: 300_000,
      hookTimeoutMs: 200,
      tasks: {},
    });
  });

  it('should return defaults when the file is missing', async () => {
    const config = await loadConfig(join(tempDir, 'missing.json'));
    expect(config.tickIntervalMs).toBe(1000);
    expect(config.tasks).toEqual({});
  });

  it('should read the file, interpolate env vars and expand ~', async () => {
    vi.stubEnv('CRONKEEP_TEST_BACKUP_CMD', '/usr/bin/rsync');
    const path = join(tempDir, 'config.json');
    await writeFile(
      path,
      JSON.stringify({
        timezone: 'Asia/Shanghai',
        storePath: '~/cron/jobs.json',
        tasks: {
          backup: { command: '${CRONKEEP_TEST_BACKUP_CMD}', cwd: '~/data' },
        },
      }),
    );

    const config = await loadConfig(path);
    expect(config.timezone).toBe('Asia/Shanghai');
    expect(config.storePath).toBe(join(homedir(), 'cron', 'jobs.json'));
    expect(config.tasks).toEqual({
      backup: { command: '/usr/bin/rsync', args: [], cwd: join(homedir(), 'data') },
    });
  });

  it('should honour CRONKEEP_CONFIG', async () => {
    const path = join(tempDir, 'other.json');
    await writeFile(path, JSON.stringify({ tickIntervalMs: 250 }));
    vi.stubEnv('CRONKEEP_CONFIG', path);

    const config = await loadConfig();
    expect(config.tickIntervalMs).toBe(250);
  });

  it('should list validation issues', async () => {
    const path = join(tempDir, 'config.json');
    await writeFile(path, JSON.stringify({ tickIntervalMs: -1, timezone: 'Mars/Olympus_Mons' }));

    await expect(loadConfig(path)).rejects.toThrow(
      `Invalid config at ${path}:\n` +
        '  timezone: unknown IANA timezone\n' +
        '  tickIntervalMs: Number must be greater than 0',
    );
  });

  it('should reject malformed JSON', async () => {
    const path = join(tempDir, 'config.json');
    await writeFile(path, '{ "timezone": ');
    await expect(loadConfig(path)).rejects.toThrow(`Config at ${path} is not valid JSON`);
  });

  describe('interpolateEnv', () => {
    it('should substitute an empty string for unset variables', () => {
      vi.stubEnv('CRONKEEP_TEST_SET', 'yes');
      expect(interpolateEnv('${CRONKEEP_TEST_SET}/${CRONKEEP_TEST_UNSET_VAR}')).toBe('yes/');
    });
  });

  describe('expandHome', () => {
    it('should only expand a leading ~/', () => {
      expect(expandHome('~/x')).toBe(join(homedir(), 'x'));
      expect(expandHome('/abs/~/x')).toBe('/abs/~/x');
    });
  });
});
