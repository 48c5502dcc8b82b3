import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { logThought, scrubSensitiveText } from '../../src/utils/logger.js';

describe('scrubSensitiveText', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('replaces configured key values with a named marker', () => {
    vi.stubEnv('OPENROUTER_API_KEY', 'env-secret-leak-value-123456789');
    expect(scrubSensitiveText('trace => env-secret-leak-value-123456789 <= hidden'))
      .toBe('trace => [REDACTED:OPENROUTER_API_KEY] <= hidden');
  });

  it('redacts provider-shaped keys and bearer tokens', () => {
    expect(scrubSensitiveText('key sk-ant-REDACTED used')).toBe('key [REDACTED] used');
    expect(scrubSensitiveText('Authorization: Bearer abc.def.ghi123')).toBe('Authorization: [REDACTED]');
  });

  it('redacts key assignments while keeping their shape', () => {
    expect(scrubSensitiveText('api_key="test-secret" retry=2')).toBe('api_key="[REDACTED]" retry=2');
    expect(scrubSensitiveText('password: hunter22')).toBe('password: [REDACTED]');
  });

  it('leaves ordinary text alone', () => {
    expect(scrubSensitiveText('Summarized 6 messages; cursor now 6.')).toBe('Summarized 6 messages; cursor now 6.');
  });
});

describe('logThought', () => {
  let home: string | null = null;

  afterEach(async () => {
    vi.unstubAllEnvs();
    if (home) await fs.rm(home, { recursive: true, force: true });
    home = null;
  });

  it('appends a scrubbed, timestamped line to the daily log', async () => {
    home = await fs.mkdtemp(path.join(os.tmpdir(), 'lodestar-log-'));
    vi.stubEnv('LODESTAR_HOME', home);

    await logThought('[Test] token=test-secret');

    const files = await fs.readdir(path.join(home, 'logs'));
    expect(files).toHaveLength(1);
    const content = await fs.readFile(path.join(home, 'logs', files[0] ?? ''), 'utf-8');
    expect(content).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[Test\] token=\[REDACTED\]\n$/);
  });
});
