import type { PromptMessage } from '../core/types.js';
import type { RetrievedChunk } from '../types/retrieval.js';
import { ConversationHistory } from './conversation-history.js';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant.';

export function formatSummaryBlock(xmlSummary: string): string {
  return `PREVIOUS CONTEXT HAS BEEN SUMMARIZED AS FOLLOWS:\n\n${xmlSummary}\n\nCONTINUE THE CONVERSATION SEAMLESSLY.`;
}

export function formatRetrievedChunks(chunks: readonly RetrievedChunk[]): string {
  const lines = [
    'RELEVANT CONTEXT FROM ATTACHED DOCUMENTS:',
    '(Use this information to inform your response. Cite sources when directly referencing content.)',
    '',
  ];
  chunks.forEach((chunk, position) => {
    lines.push(`[Source ${position + 1}: ${chunk.source}`);
    if (chunk.section) {
      lines.push(` Section: ${chunk.section}`);
    }
    lines.push(` Relevance: ${chunk.score.toFixed(2)}]`);
    lines.push(chunk.content);
    lines.push('');
  });
  return lines.join('\n');
}

/**
 * Assembly point for the payload handed to a model adapter. Context blocks are
 * opaque strings set by collaborators; the history supplies only its active
 * messages.
 */
export class PromptBuilder {
  readonly history: ConversationHistory;
  #systemPrompt: string;
  #summaryXml: string | null = null;
  #memory: string | null = null;
  #scratchpad: string | null = null;
  #sideNotes: string[] = [];
  #ragContext: string | null = null;
  #ragChunks: RetrievedChunk[] = [];
  #intentHint: string | null = null;

  constructor(systemPrompt: string = DEFAULT_SYSTEM_PROMPT, history: ConversationHistory = new ConversationHistory()) {
    this.#systemPrompt = systemPrompt.trim() ? systemPrompt : DEFAULT_SYSTEM_PROMPT;
    this.history = history;
  }

  getSystemPrompt(): string {
    return this.#systemPrompt;
  }

  setSystemPrompt(prompt: string): void {
    this.#systemPrompt = prompt.trim() ? prompt : DEFAULT_SYSTEM_PROMPT;
  }

  /** Replaces any previous summary; an empty string clears it. */
  setSummary(xmlSummary: string): void {
    this.#summaryXml = xmlSummary ? xmlSummary : null;
  }

  getSummary(): string | null {
    return this.#summaryXml;
  }

  clearSummary(): void {
    this.#summaryXml = null;
  }

  setMemory(text: string): void {
    this.#memory = text.trim() ? text : null;
  }

  getMemory(): string | null {
    return this.#memory;
  }

  clearMemory(): void {
    this.#memory = null;
  }

  setScratchpad(text: string): void {
    this.#scratchpad = text.trim() ? text : null;
  }

  getScratchpad(): string | null {
    return this.#scratchpad;
  }

  clearScratchpad(): void {
    this.#scratchpad = null;
  }

  /** Digest of a merged side conversation; several accumulate in order. */
  addSideNote(text: string): void {
    if (text.trim()) {
      this.#sideNotes.push(text);
    }
  }

  getSideNotes(): string[] {
    return [...this.#sideNotes];
  }

  clearSideNotes(): void {
    this.#sideNotes = [];
  }

  setRagContext(chunks: readonly RetrievedChunk[]): void {
    if (chunks.length === 0) {
      this.clearRagContext();
      return;
    }
    this.#ragChunks = [...chunks];
    this.#ragContext = formatRetrievedChunks(chunks);
  }

  getRagContext(): string | null {
    return this.#ragContext;
  }

  getRagChunks(): RetrievedChunk[] {
    return [...this.#ragChunks];
  }

  clearRagContext(): void {
    this.#ragContext = null;
    this.#ragChunks = [];
  }

  setIntentHint(hint: string): void {
    this.#intentHint = hint.trim() ? hint : null;
  }

  getIntentHint(): string | null {
    return this.#intentHint;
  }

  clearIntentHint(): void {
    this.#intentHint = null;
  }

  /** Leading context notes in fixed order, each as its own user-role message. */
  buildContextNotes(): PromptMessage[] {
    const notes: PromptMessage[] = [];
    if (this.#summaryXml) {
      notes.push({ role: 'user', content: formatSummaryBlock(this.#summaryXml) });
    }
    if (this.#memory) {
      notes.push({ role: 'user', content: `PERSISTENT MEMORY:\n${this.#memory}` });
    }
    if (this.#scratchpad) {
      notes.push({ role: 'user', content: `SCRATCHPAD:\n${this.#scratchpad}` });
    }
    for (const note of this.#sideNotes) {
      notes.push({ role: 'user', content: note });
    }
    if (this.#ragContext) {
      notes.push({ role: 'user', content: this.#ragContext });
    }
    if (this.#intentHint) {
      notes.push({ role: 'user', content: this.#intentHint });
    }
    return notes;
  }

  /** Summary, memory, scratchpad, side notes, retrieval, intent hint, then active history. */
  buildMessages(): PromptMessage[] {
    return [...this.buildContextNotes(), ...this.history.toPromptMessages()];
  }

  /** Starts a fresh conversation. Memory, scratchpad and the system prompt persist. */
  reset(): void {
    this.history.clear();
    this.#summaryXml = null;
    this.#sideNotes = [];
    this.clearRagContext();
    this.#intentHint = null;
  }
}
