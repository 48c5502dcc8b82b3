import type { ChatMessage, ChatRole } from '../core/types.js';
import type { TocEntry } from '../types/orchestration.js';

const TITLE_MAX_CHARS = 50;
const QUESTION_TITLE_MAX_CHARS = 60;
const MIN_QUESTION_CHARS = 20;

const HEADING_PATTERN = /^#+\s+(.+)$/m;

const QUESTION_PATTERNS: readonly RegExp[] = [
  /\?$/,
  /^(how|what|why|when|where|can|could|would|should|is|are|do|does)\s/,
  /^explain\s/,
  /^tell me about\s/,
  /^describe\s/,
];

const TOPIC_PATTERNS: readonly RegExp[] = [
  /^##?\s+(.+)$/im,
  /^(?:let's|let me|i'll|i will)\s+(?:discuss|explain|cover|talk about)\s+(.+?)[.\n]/im,
  /^(?:topic|section|part):\s*(.+)$/im,
];

export interface TocGeneratorOptions {
  now?: () => Date;
}

export function extractHeading(message: string): string | null {
  const match = HEADING_PATTERN.exec(message);
  return match?.[1] ? match[1].trim().slice(0, TITLE_MAX_CHARS) : null;
}

export function isSignificantQuestion(message: string): boolean {
  if (message.length < MIN_QUESTION_CHARS) {
    return false;
  }
  const lowered = message.toLowerCase().trim();
  return QUESTION_PATTERNS.some((pattern) => pattern.test(lowered));
}

/** First line of the question, cut at a word boundary when it runs long. */
export function extractQuestionTitle(message: string): string | null {
  const firstLine = (message.split('\n')[0] ?? '').trim();
  if (firstLine.length > QUESTION_TITLE_MAX_CHARS) {
    let truncated = firstLine.slice(0, QUESTION_TITLE_MAX_CHARS - 3);
    const lastSpace = truncated.lastIndexOf(' ');
    if (lastSpace > 30) {
      truncated = truncated.slice(0, lastSpace);
    }
    return `${truncated}...`;
  }
  return firstLine || null;
}

export function extractTopicIndicator(message: string): string | null {
  for (const pattern of TOPIC_PATTERNS) {
    const match = pattern.exec(message);
    if (match?.[1]) {
      return match[1].trim().slice(0, TITLE_MAX_CHARS);
    }
  }
  return null;
}

/**
 * Navigable outline of a conversation: markdown headings, significant user
 * questions, topic openers in replies, and user waypoints, ordered by
 * message index.
 */
export class TocGenerator {
  readonly #now: () => Date;
  #entries: TocEntry[] = [];
  #waypointCount = 0;

  constructor(options: TocGeneratorOptions = {}) {
    this.#now = options.now ?? (() => new Date());
  }

  /** Idempotent per index. Untitled waypoints are numbered in the order they are added. */
  addWaypoint(messageIndex: number, options: { title?: string; createdAt?: Date } = {}): TocEntry {
    const existing = this.#entries.find((entry) => entry.kind === 'waypoint' && entry.messageIndex === messageIndex);
    if (existing) {
      return { ...existing };
    }
    this.#waypointCount += 1;
    const entry: TocEntry = {
      id: `waypoint-${messageIndex}`,
      title: options.title?.trim() || `Waypoint ${this.#waypointCount}`,
      messageIndex,
      level: 1,
      kind: 'waypoint',
      createdAt: options.createdAt ?? this.#now(),
    };
    this.#insert(entry);
    return { ...entry };
  }

  removeWaypoint(messageIndex: number): boolean {
    const before = this.#entries.length;
    this.#entries = this.#entries.filter((entry) => entry.kind !== 'waypoint' || entry.messageIndex !== messageIndex);
    return this.#entries.length < before;
  }

  /** Adds an entry when the message carries structure worth navigating to. */
  analyzeMessage(content: string, role: ChatRole, messageIndex: number): TocEntry | null {
    const entry = this.#classify(content, role, messageIndex);
    if (entry) {
      this.#insert(entry);
      return { ...entry };
    }
    return null;
  }

  getEntries(): TocEntry[] {
    return this.#entries.map((entry) => ({ ...entry }));
  }

  /** The last entry at or before `messageIndex`. */
  getCurrentSection(messageIndex: number): TocEntry | null {
    let current: TocEntry | null = null;
    for (const entry of this.#entries) {
      if (entry.messageIndex > messageIndex) break;
      current = entry;
    }
    return current ? { ...current } : null;
  }

  /** Regenerates the automatic entries; waypoints are kept. */
  rebuildFromMessages(messages: readonly ChatMessage[]): TocEntry[] {
    this.#entries = this.#entries.filter((entry) => entry.kind === 'waypoint');
    messages.forEach((message, index) => {
      this.analyzeMessage(message.content, message.role, index);
    });
    return this.getEntries();
  }

  clear(): void {
    this.#entries = [];
    this.#waypointCount = 0;
  }

  #classify(content: string, role: ChatRole, messageIndex: number): TocEntry | null {
    const heading = extractHeading(content);
    if (heading) {
      return this.#entry(`heading-${messageIndex}`, heading, messageIndex, 1, 'heading');
    }
    if (role === 'user') {
      const title = isSignificantQuestion(content) ? extractQuestionTitle(content) : null;
      return title ? this.#entry(`question-${messageIndex}`, title, messageIndex, 2, 'auto') : null;
    }
    const topic = extractTopicIndicator(content);
    return topic ? this.#entry(`topic-${messageIndex}`, topic, messageIndex, 1, 'auto') : null;
  }

  #entry(id: string, title: string, messageIndex: number, level: 1 | 2, kind: TocEntry['kind']): TocEntry {
    return { id, title, messageIndex, level, kind, createdAt: this.#now() };
  }

  #insert(entry: TocEntry): void {
    this.#entries.push(entry);
    // stable, so entries on one message keep their insertion order
    this.#entries.sort((a, b) => a.messageIndex - b.messageIndex);
  }
}
