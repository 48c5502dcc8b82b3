import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { exportFileName, exportToMarkdown, saveMarkdownExport } from '../../src/services/markdown-export.js';

const EXPORTED_AT = new Date('2026-04-01T08:00:00.000Z');

const messages = [
  { role: 'user' as const, content: 'Should we use cedar?' },
  { role: 'assistant' as const, content: 'Yes, cedar resists rot.' },
];

describe('exportToMarkdown', () => {
  it('writes the header, each turn and the footer', () => {
    const markdown = exportToMarkdown({
      messages,
      modelsUsed: ['claude-sonnet-4', 'gpt-4o', 'llama-3', 'mistral-large'],
      tokenCount: 12345,
      sessionId: 'abcdef1234567890',
      exportedAt: EXPORTED_AT,
    });

    expect(markdown).toBe([
      '# Lodestar Conversation Export',
      '',
      '**Exported:** 2026-04-01T08:00:00.000Z',
      '**Session ID:** abcdef12...',
      '**Models Used:** claude-sonnet-4, gpt-4o, llama-3 (+1 more)',
      '**Total Tokens:** 12,345',
      '',
      '---',
      '',
      '## User',
      '',
      'Should we use cedar?',
      '',
      '## Assistant',
      '',
      'Yes, cedar resists rot.',
      '',
      '---',
      '',
      '*Exported from Lodestar*',
    ].join('\n'));
  });

  it('leaves out metadata lines that have no value', () => {
    const markdown = exportToMarkdown({ messages: [], tokenCount: 0, exportedAt: EXPORTED_AT });

    expect(markdown).toBe(
      '# Lodestar Conversation Export\n\n**Exported:** 2026-04-01T08:00:00.000Z\n\n---\n\n---\n\n*Exported from Lodestar*',
    );
  });
});

describe('exportFileName', () => {
  it('stamps the name with the UTC time', () => {
    expect(exportFileName(undefined, EXPORTED_AT)).toBe('lodestar_export_2026-04-01_080000.md');
    expect(exportFileName('garden', new Date('2026-12-31T23:59:07.000Z'))).toBe('garden_2026-12-31_235907.md');
  });
});

describe('saveMarkdownExport', () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) await fs.rm(tempDir, { recursive: true, force: true });
    tempDir = null;
  });

  it('creates missing directories and writes the document', async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'exports-'));
    const target = path.join(tempDir, 'nested', 'chat.md');

    const written = await saveMarkdownExport(target, { messages, exportedAt: EXPORTED_AT });

    expect(written).toBe(target);
    expect(await fs.readFile(target, 'utf-8')).toBe(exportToMarkdown({ messages, exportedAt: EXPORTED_AT }));
  });
});
