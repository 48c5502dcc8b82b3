import type { ChatMessage, ChatRole, PromptMessage } from '../core/types.js';

export interface IndexedMessage extends ChatMessage {
  index: number;
}

/**
 * Authoritative, append-only turn log. A single cursor splits it into
 * summarized (`index < summarizedUpTo`) and active messages; the cursor only
 * moves forward until `clear()`.
 */
export class ConversationHistory {
  #messages: ChatMessage[] = [];
  #summarizedUpTo = 0;

  get length(): number {
    return this.#messages.length;
  }

  /** Count of leading messages represented only by the summary. */
  get summarizedUpTo(): number {
    return this.#summarizedUpTo;
  }

  get activeCount(): number {
    return this.#messages.length - this.#summarizedUpTo;
  }

  addUser(content: string): IndexedMessage {
    return this.#append('user', content);
  }

  addAssistant(content: string): IndexedMessage {
    return this.#append('assistant', content);
  }

  at(index: number): IndexedMessage | null {
    const message = this.#messages[index];
    return message ? { index, role: message.role, content: message.content } : null;
  }

  last(): IndexedMessage | null {
    return this.at(this.#messages.length - 1);
  }

  getAll(): IndexedMessage[] {
    return this.#messages.map((message, index) => ({ index, role: message.role, content: message.content }));
  }

  getActiveMessages(): IndexedMessage[] {
    return this.getAll().slice(this.#summarizedUpTo);
  }

  getSummarizedMessages(): IndexedMessage[] {
    return this.getAll().slice(0, this.#summarizedUpTo);
  }

  toPromptMessages(includeSummarized = false): PromptMessage[] {
    const source = includeSummarized ? this.getAll() : this.getActiveMessages();
    return source.map((message) => ({ role: message.role, content: message.content }));
  }

  /** Active messages with index <= `boundary`, or every active message when `boundary` is null. */
  getMessagesForSummarization(boundary: number | null): IndexedMessage[] {
    const active = this.getActiveMessages();
    if (boundary === null) {
      return active;
    }
    return active.filter((message) => message.index <= boundary);
  }

  /**
   * Moves the cursor so that every message below `upTo` counts as summarized.
   * Never moves backwards; returns how many messages were newly marked.
   */
  markSummarized(upTo: number): number {
    const target = Math.min(this.#messages.length, Math.max(this.#summarizedUpTo, Math.floor(upTo)));
    const marked = target - this.#summarizedUpTo;
    this.#summarizedUpTo = target;
    return marked;
  }

  /** Pops the trailing assistant message for regeneration. Fails on a user tail or an empty log. */
  removeLastAssistant(): boolean {
    const last = this.#messages[this.#messages.length - 1];
    if (!last || last.role !== 'assistant' || this.#messages.length - 1 < this.#summarizedUpTo) {
      return false;
    }
    this.#messages.pop();
    return true;
  }

  /** Pops a trailing user message, used when a turn is rolled back before any reply. */
  removeLastUser(): boolean {
    const last = this.#messages[this.#messages.length - 1];
    if (!last || last.role !== 'user' || this.#messages.length - 1 < this.#summarizedUpTo) {
      return false;
    }
    this.#messages.pop();
    return true;
  }

  /** Pops the trailing user+assistant pair atomically, or nothing. */
  removeLastExchange(): boolean {
    const length = this.#messages.length;
    const user = this.#messages[length - 2];
    const assistant = this.#messages[length - 1];
    if (!user || !assistant || user.role !== 'user' || assistant.role !== 'assistant') {
      return false;
    }
    if (length - 2 < this.#summarizedUpTo) {
      return false;
    }
    this.#messages.splice(length - 2, 2);
    return true;
  }

  getLastUserMessage(): IndexedMessage | null {
    for (let index = this.#messages.length - 1; index >= 0; index -= 1) {
      const message = this.#messages[index];
      if (message?.role === 'user') {
        return { index, role: message.role, content: message.content };
      }
    }
    return null;
  }

  /** Replaces the log and cursor wholesale, e.g. when a saved session is loaded. */
  restore(messages: readonly ChatMessage[], summarizedUpTo: number): void {
    this.#messages = messages.map((message) => ({ role: message.role, content: message.content }));
    this.#summarizedUpTo = Math.max(0, Math.min(this.#messages.length, Math.floor(summarizedUpTo)));
  }

  /** Keeps the messages but treats all of them as active again. */
  resetCursor(): void {
    this.#summarizedUpTo = 0;
  }

  clear(): void {
    this.#messages = [];
    this.#summarizedUpTo = 0;
  }

  #append(role: ChatRole, content: string): IndexedMessage {
    this.#messages.push({ role, content });
    return { index: this.#messages.length - 1, role, content };
  }
}
