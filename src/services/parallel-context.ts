import type { ChatRole, PromptMessage } from '../core/types.js';

const SUMMARY_LINE_MAX_CHARS = 200;

export const SIDE_SYSTEM_PROMPT =
  'You are answering a quick side question. Keep your response focused and concise. ' +
  'This is a clarification or exploration that may or may not be merged back into the main conversation.';

export interface SideMessage {
  role: ChatRole;
  content: string;
  createdAt: Date;
}

export function buildSideSystemPrompt(mainContextSummary?: string | null): string {
  if (!mainContextSummary) {
    return SIDE_SYSTEM_PROMPT;
  }
  return `${SIDE_SYSTEM_PROMPT}\n\nMain conversation context:\n${mainContextSummary}`;
}

/** A short thread beside the main conversation. */
export class SideConversation {
  readonly createdAt: Date;
  #messages: SideMessage[] = [];
  #merged = false;

  constructor(createdAt: Date = new Date()) {
    this.createdAt = createdAt;
  }

  get messages(): SideMessage[] {
    return this.#messages.map((message) => ({ ...message }));
  }

  get length(): number {
    return this.#messages.length;
  }

  get merged(): boolean {
    return this.#merged;
  }

  addMessage(role: ChatRole, content: string, createdAt: Date = new Date()): void {
    this.#messages.push({ role, content, createdAt });
  }

  /** Drops a trailing user message whose reply never arrived. */
  removeLastUser(): boolean {
    const last = this.#messages[this.#messages.length - 1];
    if (!last || last.role !== 'user') {
      return false;
    }
    this.#messages.pop();
    return true;
  }

  getLastUserMessage(): string | null {
    for (let i = this.#messages.length - 1; i >= 0; i--) {
      const message = this.#messages[i];
      if (message?.role === 'user') return message.content;
    }
    return null;
  }

  /** Compact Q/A digest for folding back into the main conversation. */
  toSummary(): string {
    if (this.#messages.length === 0) {
      return '';
    }
    const lines = ['[Side Discussion Summary]'];
    for (const message of this.#messages) {
      const prefix = message.role === 'user' ? 'Q:' : 'A:';
      const content = message.content.length > SUMMARY_LINE_MAX_CHARS
        ? `${message.content.slice(0, SUMMARY_LINE_MAX_CHARS)}...`
        : message.content;
      lines.push(`${prefix} ${content}`);
    }
    return lines.join('\n');
  }

  buildMessages(): PromptMessage[] {
    return this.#messages.map((message) => ({ role: message.role, content: message.content }));
  }

  markMerged(): void {
    this.#merged = true;
  }
}

/**
 * Holds at most one open side conversation plus the archive of closed ones.
 * Side threads share retrieval context and the model with the main
 * conversation, never its history, summary cursor or waypoints.
 */
export class ParallelContextManager {
  readonly #now: () => Date;
  #active: SideConversation | null = null;
  #archive: SideConversation[] = [];

  constructor(now: () => Date = () => new Date()) {
    this.#now = now;
  }

  get active(): SideConversation | null {
    return this.#active;
  }

  /** Opens a fresh side conversation; one already open is archived unmerged. */
  start(): SideConversation {
    if (this.#active) {
      this.#archive.push(this.#active);
    }
    this.#active = new SideConversation(this.#now());
    return this.#active;
  }

  /** Closes the open side conversation. With `merge`, returns its digest. */
  end(merge = false): string | null {
    const side = this.#active;
    if (!side) {
      return null;
    }
    let summary: string | null = null;
    if (merge && side.length > 0) {
      side.markMerged();
      summary = side.toSummary();
    }
    this.#archive.push(side);
    this.#active = null;
    return summary;
  }

  addUserMessage(content: string): boolean {
    if (!this.#active) return false;
    this.#active.addMessage('user', content, this.#now());
    return true;
  }

  addAssistantMessage(content: string): boolean {
    if (!this.#active) return false;
    this.#active.addMessage('assistant', content, this.#now());
    return true;
  }

  getHistory(): SideConversation[] {
    return [...this.#archive];
  }

  clear(): void {
    this.#active = null;
    this.#archive = [];
  }
}
