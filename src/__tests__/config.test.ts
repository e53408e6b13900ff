import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  applyEnvOverrides,
  defaultConfig,
  initializeProject,
  isInitialized,
  loadConfig,
  localConfigPath,
  parseThreshold,
} from '../config.js';

describe('config', () => {
  let cwd: string;
  let globalDir: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'mailguard-config-'));
    globalDir = join(cwd, 'global-home');
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  async function writeLocal(contents: string): Promise<void> {
    await mkdir(join(cwd, '.mailguard'), { recursive: true });
    await writeFile(localConfigPath(cwd), contents, 'utf-8');
  }

  it('falls back to defaults without a file or env', async () => {
    const resolved = await loadConfig({ cwd, env: {}, globalDir });
    expect(resolved).toEqual({
      config: { version: '1.0.0', pii: { enabled: true, threshold: 0.8 } },
      file: null,
      envOverrides: [],
    });
  });

  it('merges a partial local file over the defaults', async () => {
    await writeLocal(JSON.stringify({ pii: { threshold: 0.5 } }));

    const resolved = await loadConfig({ cwd, env: {}, globalDir });
    expect(resolved.config.pii).toEqual({ enabled: true, threshold: 0.5 });
    expect(resolved.file).toBe(localConfigPath(cwd));
  });

  it('reads the global file when there is no local one', async () => {
    await mkdir(globalDir, { recursive: true });
    await writeFile(join(globalDir, 'config.json'), JSON.stringify({ pii: { enabled: false } }));

    const resolved = await loadConfig({ cwd, env: {}, globalDir });
    expect(resolved.config.pii.enabled).toBe(false);
    expect(resolved.file).toBe(join(globalDir, 'config.json'));
  });

  it('takes the global directory from MAILGUARD_HOME', async () => {
    await mkdir(globalDir, { recursive: true });
    await writeFile(join(globalDir, 'config.json'), JSON.stringify({ pii: { threshold: 0.3 } }));

    const resolved = await loadConfig({ cwd, env: { MAILGUARD_HOME: globalDir } });
    expect(resolved.config.pii.threshold).toBe(0.3);
    expect(resolved.file).toBe(join(globalDir, 'config.json'));
    expect(resolved.envOverrides).toEqual([]);
  });

  it('lets environment variables override the file', async () => {
    await writeLocal(JSON.stringify({ pii: { enabled: true, threshold: 0.5 } }));

    const resolved = await loadConfig({
      cwd,
      env: { ENABLE_PII_VALIDATION: 'FALSE', PII_THRESHOLD: '0.9' },
      globalDir,
    });
    expect(resolved.config.pii).toEqual({ enabled: false, threshold: 0.9 });
    expect(resolved.envOverrides).toEqual(['ENABLE_PII_VALIDATION', 'PII_THRESHOLD']);
  });

  it('rejects out-of-range thresholds in the file', async () => {
    await writeLocal(JSON.stringify({ pii: { threshold: 2 } }));

    await expect(loadConfig({ cwd, env: {}, globalDir })).rejects.toThrow(
      `Invalid config file ${localConfigPath(cwd)}: pii.threshold:`,
    );
  });

  it('rejects malformed JSON', async () => {
    await writeLocal('{ "pii": ');

    await expect(loadConfig({ cwd, env: {}, globalDir })).rejects.toThrow('Invalid config file');
  });

  it('initializes a project with the default config', async () => {
    expect(isInitialized(cwd)).toBe(false);
    await initializeProject(cwd);
    expect(isInitialized(cwd)).toBe(true);

    const raw = await readFile(localConfigPath(cwd), 'utf-8');
    expect(JSON.parse(raw)).toEqual(defaultConfig());
  });

  describe('applyEnvOverrides', () => {
    it('treats anything but "true" as disabled', () => {
      const { config } = applyEnvOverrides(defaultConfig(), { ENABLE_PII_VALIDATION: 'yes' });
      expect(config.pii.enabled).toBe(false);
    });

    it('ignores blank values', () => {
      const { config, overrides } = applyEnvOverrides(defaultConfig(), {
        ENABLE_PII_VALIDATION: '',
        PII_THRESHOLD: '  ',
      });
      expect(config).toEqual(defaultConfig());
      expect(overrides).toEqual([]);
    });

    it('throws on a non-numeric threshold', () => {
      expect(() => applyEnvOverrides(defaultConfig(), { PII_THRESHOLD: 'abc' })).toThrow(
        'Invalid PII_THRESHOLD "abc"',
      );
    });
  });

  describe('parseThreshold', () => {
    it('accepts the closed range 0..1', () => {
      expect(parseThreshold('0', '--threshold')).toBe(0);
      expect(parseThreshold(' 1 ', '--threshold')).toBe(1);
    });

    it('rejects values above 1', () => {
      expect(() => parseThreshold('1.5', '--threshold')).toThrow('Invalid --threshold "1.5"');
    });

    it('rejects blank input instead of reading it as 0', () => {
      expect(() => parseThreshold('', '--threshold')).toThrow('Invalid --threshold "": expected a number');
      expect(() => parseThreshold('  ', '--threshold')).toThrow('Invalid --threshold "  "');
    });
  });
});
