import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CONFIG_ENV_VAR,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadAppConfig,
  parseAppConfig,
} from '@/core/AppConfig';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { captureError } from '../helpers';

describe('AppConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'thrustbench-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('defaults every field', () => {
    expect(DEFAULT_CONFIG).toEqual({
      simulation: { defaultPreset: 'default', maxBurnTime: null },
      output: { precision: 2 },
      logging: { level: 'info' },
    });
    expect(parseAppConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('merges partial sections with defaults', () => {
    const config = parseAppConfig({ output: { precision: 4 }, simulation: { maxBurnTime: 30 } });
    expect(config.output.precision).toBe(4);
    expect(config.simulation).toEqual({ defaultPreset: 'default', maxBurnTime: 30 });
    expect(config.logging.level).toBe('info');
  });

  it('names the offending field', () => {
    const err = captureError(() => parseAppConfig({ logging: { level: 'loud' } }, 'test.json'));
    expect(err.kind).toBe('InvalidConfig');
    expect(err.message).toMatch(/^Invalid test\.json: logging\.level: /);
  });

  it('falls back to defaults when no file exists', () => {
    expect(loadAppConfig({ cwd: dir, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('reads the file in the working directory', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), JSON.stringify({ logging: { level: 'debug' } }));
    expect(loadAppConfig({ cwd: dir, env: {} }).logging.level).toBe('debug');
  });

  it('prefers an explicit path over the environment variable', () => {
    writeFileSync(join(dir, 'a.json'), JSON.stringify({ output: { precision: 1 } }));
    writeFileSync(join(dir, 'b.json'), JSON.stringify({ output: { precision: 5 } }));
    const env = { [CONFIG_ENV_VAR]: 'b.json' };
    expect(loadAppConfig({ cwd: dir, env }).output.precision).toBe(5);
    expect(loadAppConfig({ cwd: dir, env, path: 'a.json' }).output.precision).toBe(1);
  });

  it('fails on a missing explicit file or malformed JSON', () => {
    expect(captureError(() => loadAppConfig({ cwd: dir, env: {}, path: 'nope.json' })).kind).toBe('InvalidConfig');
    writeFileSync(join(dir, CONFIG_FILE_NAME), '{ not json');
    expect(captureError(() => loadAppConfig({ cwd: dir, env: {} })).kind).toBe('InvalidConfig');
  });
});
