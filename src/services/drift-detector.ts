import { readDataFile } from '../utils/data-files.js';
import { isStringArray } from '../utils/json.js';
import type { DriftResult } from '../types/orchestration.js';

export interface DriftDetectorConfig {
  windowSize: number;
  threshold: number;
}

const DEFAULT_DRIFT_CONFIG: DriftDetectorConfig = {
  windowSize: 6,
  threshold: 0.25,
};

const KEYWORD_PATTERN = /\b[a-z]{3,}\b/g;

let stopWords: ReadonlySet<string> | null = null;

function loadStopWords(): ReadonlySet<string> {
  if (stopWords) {
    return stopWords;
  }
  const raw = readDataFile('stop-words.json');
  if (!isStringArray(raw)) {
    throw new Error('data/stop-words.json must be an array of strings.');
  }
  stopWords = new Set(raw);
  return stopWords;
}

export function extractKeywords(text: string): Set<string> {
  const excluded = loadStopWords();
  const keywords = new Set<string>();
  for (const word of text.toLowerCase().match(KEYWORD_PATTERN) ?? []) {
    if (!excluded.has(word)) {
      keywords.add(word);
    }
  }
  return keywords;
}

/**
 * Tracks a rolling keyword centroid over the last `windowSize` messages and
 * scores each new message against it. The window re-baselines after every
 * message, drift or not, so a gradually evolving topic is followed while an
 * abrupt jump still scores low.
 */
export class DriftDetector {
  readonly #windowSize: number;
  #threshold: number;
  #window: Array<Set<string>> = [];
  readonly #centroid = new Map<string, number>();

  constructor(overrides: Partial<DriftDetectorConfig> = {}) {
    const merged = { ...DEFAULT_DRIFT_CONFIG, ...overrides };
    this.#windowSize = Math.max(1, Math.floor(merged.windowSize));
    this.#threshold = clampUnit(merged.threshold, DEFAULT_DRIFT_CONFIG.threshold);
  }

  get windowSize(): number {
    return this.#windowSize;
  }

  get threshold(): number {
    return this.#threshold;
  }

  set threshold(value: number) {
    this.#threshold = clampUnit(value, this.#threshold);
  }

  analyze(message: string): DriftResult {
    const keywords = extractKeywords(message);

    if (this.#window.length < 2) {
      this.#addToWindow(keywords);
      return {
        isDrift: false,
        similarity: 1,
        currentKeywords: keywords,
        centroidKeywords: new Set(this.#centroid.keys()),
      };
    }

    const similarity = this.#similarity(keywords);
    this.#addToWindow(keywords);

    return {
      isDrift: similarity < this.#threshold,
      similarity,
      currentKeywords: keywords,
      centroidKeywords: new Set(this.#centroid.keys()),
    };
  }

  /** Centroid words ordered by count, ties in first-seen order. */
  getTopKeywords(n = 10): string[] {
    return [...this.#centroid.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, Math.max(0, n))
      .map(([word]) => word);
  }

  getCentroid(): ReadonlyMap<string, number> {
    return new Map(this.#centroid);
  }

  reset(): void {
    this.#window = [];
    this.#centroid.clear();
  }

  /** Rebuilds the baseline from the trailing `windowSize` texts, e.g. after summarization. */
  recalculate(messages: readonly string[]): void {
    this.reset();
    for (const text of messages.slice(-this.#windowSize)) {
      this.#addToWindow(extractKeywords(text));
    }
  }

  #similarity(keywords: Set<string>): number {
    if (keywords.size === 0 || this.#centroid.size === 0) {
      return 0;
    }

    let overlap = 0;
    const union = new Set(this.#centroid.keys());
    for (const word of keywords) {
      const count = this.#centroid.get(word);
      if (count !== undefined) {
        overlap += Math.min(1, count / 2);
      }
      union.add(word);
    }

    return overlap / union.size;
  }

  #addToWindow(keywords: Set<string>): void {
    this.#window.push(keywords);
    for (const word of keywords) {
      this.#centroid.set(word, (this.#centroid.get(word) ?? 0) + 1);
    }

    while (this.#window.length > this.#windowSize) {
      const oldest = this.#window.shift();
      if (!oldest) {
        break;
      }
      for (const word of oldest) {
        const next = (this.#centroid.get(word) ?? 0) - 1;
        if (next <= 0) {
          this.#centroid.delete(word);
        } else {
          this.#centroid.set(word, next);
        }
      }
    }
  }
}

function clampUnit(value: number, fallback: number): number {
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(0, Math.min(1, value));
}
