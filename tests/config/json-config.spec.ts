import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_CONFIG,
  getConfigPath,
  mergeWithDefaults,
  readConfig,
  resolveApiKey,
  resolveDatabasePath,
  writeConfig,
} from '../../src/config/json-config.js';

describe('json config', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lodestar-config-'));
    configPath = path.join(tempDir, 'nested', 'lodestar.json');
    vi.stubEnv('LODESTAR_CONFIG_PATH', configPath);
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('resolves the config path from the environment override', () => {
    expect(getConfigPath()).toBe(path.resolve(configPath));
    expect(getConfigPath(path.join(tempDir, 'other.json'))).toBe(path.join(tempDir, 'other.json'));
  });

  it('returns defaults when the file does not exist', async () => {
    await expect(readConfig()).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('round-trips a written config', async () => {
    const config = mergeWithDefaults({ context: { criticalThreshold: 0.9 }, models: { defaultModel: 'gpt-4o' } });
    await writeConfig(config);

    const loaded = await readConfig();
    expect(loaded.context).toEqual({ warningThreshold: 0.6, criticalThreshold: 0.9, minActiveMessages: 4 });
    expect(loaded.models.defaultModel).toBe('gpt-4o');
    expect((await fs.readdir(path.dirname(configPath))).filter((name) => name.endsWith('.tmp'))).toEqual([]);
  });

  it('reports malformed JSON with the file path', async () => {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, '{ not json', 'utf-8');
    await expect(readConfig()).rejects.toThrow(`Failed to parse config file at ${path.resolve(configPath)}`);
  });

  it('ignores values of the wrong type and unknown artifact kinds', () => {
    const merged = mergeWithDefaults({
      drift: { windowSize: '8', threshold: 0.4 },
      artifacts: { kinds: ['outline', 'poem', 'research'] },
      storage: null,
    });
    expect(merged.drift).toEqual({ windowSize: 6, threshold: 0.4 });
    expect(merged.artifacts.kinds).toEqual(['outline', 'research']);
    expect(merged.storage.databasePath).toBe('');
  });

  it('prefers environment credentials over the file', () => {
    const config = mergeWithDefaults({ models: { anthropicApiKey: ' file-key ' } });
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    expect(resolveApiKey(config, 'anthropic')).toBe('file-key');
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    expect(resolveApiKey(config, 'anthropic')).toBe('test-secret');
  });

  it('places the session database under the workspace by default', () => {
    vi.stubEnv('LODESTAR_HOME', tempDir);
    expect(resolveDatabasePath(DEFAULT_CONFIG)).toBe(path.join(tempDir, 'sessions', 'sessions.db'));
    expect(resolveDatabasePath(mergeWithDefaults({ storage: { databasePath: ':memory:' } }))).toBe(':memory:');
  });
});
