import * as fs from 'fs/promises';
import * as path from 'path';
import type { ChatMessage } from '../core/types.js';
import type { ModelAdapter, ModelRequestOptions } from '../types/model-adapter.js';
import type { ArtifactBatch, ArtifactKind, GeneratedArtifact } from '../types/orchestration.js';

export const ARTIFACT_SYSTEM_PROMPT =
  'You are a precise assistant that generates structured summaries. Output only the requested format, no preamble or explanation.';

interface ArtifactTemplate {
  title: string;
  instructions: string;
  outputLabel: string;
}

const TEMPLATES: Record<ArtifactKind, ArtifactTemplate> = {
  outline: {
    title: 'Conversation Outline',
    instructions: `Analyze this conversation and create a structured outline.

Format as markdown with:
- Main topics discussed (## headers)
- Key points under each topic (bullet points)
- Brief summary at the end

Be concise but comprehensive. Focus on substance, not meta-commentary.`,
    outputLabel: 'markdown outline',
  },
  decisions: {
    title: 'Decision Log',
    instructions: `Analyze this conversation and extract all decisions, conclusions, and action items.

Format as markdown with:
- Decisions made (explicit choices or conclusions)
- Recommendations given
- Action items or next steps mentioned
- Open questions remaining

If no clear decisions were made, state that briefly.`,
    outputLabel: 'markdown decision log',
  },
  research: {
    title: 'Research Index',
    instructions: `Analyze this conversation and create a research index.

Format as markdown with:
- Key terms and concepts mentioned (with brief definitions if explained)
- Named entities (people, companies, products, technologies)
- Sources or references cited
- Technical terms or jargon used

Focus on indexable, searchable information.`,
    outputLabel: 'markdown research index',
  },
};

export function buildArtifactPrompt(kind: ArtifactKind, messages: readonly ChatMessage[]): string {
  const template = TEMPLATES[kind];
  const conversation = messages.map((message) => `[${message.role.toUpperCase()}]: ${message.content}`).join('\n\n');
  return `${template.instructions}\n\nCONVERSATION:\n${conversation}\n\nOUTPUT (${template.outputLabel}):`;
}

export function artifactTitle(kind: ArtifactKind): string {
  return TEMPLATES[kind].title;
}

export interface ArtifactRequest {
  messages: readonly ChatMessage[];
  adapter: ModelAdapter;
  kinds: readonly ArtifactKind[];
  maxTokens?: number;
  options?: ModelRequestOptions;
}

/** Post-conversation outline, decision log and research index. */
export class ArtifactGenerator {
  async generate(request: ArtifactRequest): Promise<ArtifactBatch> {
    const batch: ArtifactBatch = { artifacts: [], failures: [] };
    if (request.messages.length === 0) {
      for (const kind of request.kinds) {
        batch.failures.push({ kind, error: 'No messages to analyze' });
      }
      return batch;
    }

    for (const kind of request.kinds) {
      try {
        const content = await request.adapter.complete(
          [{ role: 'user', content: buildArtifactPrompt(kind, request.messages) }],
          ARTIFACT_SYSTEM_PROMPT,
          request.maxTokens ?? 2000,
          request.options,
        );
        batch.artifacts.push({ kind, title: artifactTitle(kind), content: content.trim() });
      } catch (error) {
        batch.failures.push({ kind, error: error instanceof Error ? error.message : String(error) });
      }
    }

    return batch;
  }

  /** Writes one `<sessionId>_<kind>.md` per artifact and returns the paths. */
  async save(
    artifacts: readonly GeneratedArtifact[],
    sessionId: string,
    outputDir: string,
    now: Date = new Date(),
  ): Promise<string[]> {
    await fs.mkdir(outputDir, { recursive: true });
    const saved: string[] = [];
    for (const artifact of artifacts) {
      if (!artifact.content) {
        continue;
      }
      const target = path.join(outputDir, `${sessionId}_${artifact.kind}.md`);
      const header = `# ${artifact.title}\n\n*Generated: ${now.toISOString()}*\n\n---\n\n`;
      await fs.writeFile(target, header + artifact.content, 'utf-8');
      saved.push(target);
    }
    return saved;
  }
}
