import * as fs from 'fs/promises';
import * as path from 'path';
import type { ChatMessage } from '../core/types.js';

const LISTED_MODELS = 3;

export interface MarkdownExportInput {
  messages: readonly ChatMessage[];
  modelsUsed?: readonly string[];
  tokenCount?: number;
  sessionId?: string;
  exportedAt?: Date;
}

export function exportToMarkdown(input: MarkdownExportInput): string {
  const exportedAt = input.exportedAt ?? new Date();
  const lines = ['# Lodestar Conversation Export', '', `**Exported:** ${exportedAt.toISOString()}`];

  if (input.sessionId) {
    lines.push(`**Session ID:** ${input.sessionId.slice(0, 8)}...`);
  }
  const models = input.modelsUsed ?? [];
  if (models.length > 0) {
    const extra = models.length > LISTED_MODELS ? ` (+${models.length - LISTED_MODELS} more)` : '';
    lines.push(`**Models Used:** ${models.slice(0, LISTED_MODELS).join(', ')}${extra}`);
  }
  if (input.tokenCount) {
    lines.push(`**Total Tokens:** ${input.tokenCount.toLocaleString('en-US')}`);
  }
  lines.push('', '---', '');

  for (const message of input.messages) {
    lines.push(message.role === 'user' ? '## User' : '## Assistant', '', message.content, '');
  }

  lines.push('---', '', '*Exported from Lodestar*');
  return lines.join('\n');
}

/** `<prefix>_YYYY-MM-DD_HHMMSS.md`, in UTC. */
export function exportFileName(prefix = 'lodestar_export', at: Date = new Date()): string {
  const iso = at.toISOString();
  return `${prefix}_${iso.slice(0, 10)}_${iso.slice(11, 19).replace(/:/g, '')}.md`;
}

export async function saveMarkdownExport(target: string, input: MarkdownExportInput): Promise<string> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, exportToMarkdown(input), 'utf-8');
  return target;
}
