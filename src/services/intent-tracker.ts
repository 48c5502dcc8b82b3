import { readDataFile } from '../utils/data-files.js';
import { isStringArray } from '../utils/json.js';
import type { IntentMode, IntentSignal, IntentSnapshot, IntentState } from '../types/orchestration.js';

export interface IntentTrackerConfig {
  decayRate: number;
}

export const DEFAULT_INTENT_MODE: IntentMode = 'exploration';

/** Scoring order; the first mode wins a tie. */
const MODE_ORDER: readonly IntentMode[] = ['analysis', 'drafting', 'adversarial', 'exploration'];

const RESET_FLOOR = 0.3;
const DEFAULT_CONFIDENCE = 0.5;
const ADOPT_FLOOR = 0.5;
const RECORD_FLOOR = 0.3;
const NO_MATCH_CONFIDENCE = 0.2;
const MAX_CONFIDENCE = 0.9;
const SHORT_MESSAGE_WORDS = 20;
const RECENT_SIGNAL_LIMIT = 5;

const MODE_DESCRIPTIONS: Record<IntentMode, string> = {
  exploration: 'open exploration and brainstorming',
  analysis: 'careful analysis and explanation',
  drafting: 'content creation and drafting',
  adversarial: 'critical examination and challenge',
};

export type IntentPatterns = Record<IntentMode, readonly string[]>;

let patterns: IntentPatterns | null = null;

export function loadIntentPatterns(): IntentPatterns {
  if (patterns) {
    return patterns;
  }
  const raw = readDataFile('intent-patterns.json');
  if (typeof raw !== 'object' || raw === null) {
    throw new Error('data/intent-patterns.json must be an object keyed by mode.');
  }
  const table: Partial<IntentPatterns> = {};
  for (const mode of MODE_ORDER) {
    const entry: unknown = Reflect.get(raw, mode);
    if (!isStringArray(entry)) {
      throw new Error(`data/intent-patterns.json is missing a string list for "${mode}".`);
    }
    table[mode] = entry;
  }
  patterns = {
    analysis: table.analysis ?? [],
    drafting: table.drafting ?? [],
    adversarial: table.adversarial ?? [],
    exploration: table.exploration ?? [],
  };
  return patterns;
}

/**
 * Infers the interaction mode from keyword heuristics. The result only shapes
 * a tone hint in the prompt; retrieval and summarization never read it.
 */
export class IntentTracker {
  readonly #decayRate: number;
  readonly #patterns: IntentPatterns;
  #mode: IntentMode = DEFAULT_INTENT_MODE;
  #confidence = DEFAULT_CONFIDENCE;
  #recent: IntentSignal[] = [];

  constructor(overrides: Partial<IntentTrackerConfig> = {}) {
    const decayRate = overrides.decayRate ?? 0.3;
    this.#decayRate = Number.isFinite(decayRate) ? Math.max(0, Math.min(1, decayRate)) : 0.3;
    this.#patterns = loadIntentPatterns();
  }

  get mode(): IntentMode {
    return this.#mode;
  }

  get confidence(): number {
    return this.#confidence;
  }

  get state(): IntentState {
    return { mode: this.#mode, confidence: this.#confidence };
  }

  get recentSignals(): readonly IntentSignal[] {
    return [...this.#recent];
  }

  update(message: string): IntentSignal {
    this.#applyDecay();
    const signal = this.detect(message);

    if (signal.confidence > RECORD_FLOOR) {
      this.#recent = [...this.#recent, signal].slice(-RECENT_SIGNAL_LIMIT);

      const stronger = signal.confidence > this.#confidence || signal.mode !== this.#mode;
      if (stronger && signal.confidence >= ADOPT_FLOOR) {
        this.#mode = signal.mode;
        this.#confidence = signal.confidence;
      }
    }

    return signal;
  }

  /** Scores a message without touching tracker state. */
  detect(message: string): IntentSignal {
    const lowered = message.toLowerCase();
    let bestMode: IntentMode = DEFAULT_INTENT_MODE;
    let bestMatches: string[] = [];

    for (const mode of MODE_ORDER) {
      const matches = this.#patterns[mode].filter((pattern) => lowered.includes(pattern));
      if (matches.length > bestMatches.length) {
        bestMode = mode;
        bestMatches = matches;
      }
    }

    if (bestMatches.length === 0) {
      return { mode: DEFAULT_INTENT_MODE, confidence: NO_MATCH_CONFIDENCE, matchedKeywords: [] };
    }

    let confidence = Math.min(MAX_CONFIDENCE, 0.3 + bestMatches.length * 0.2);
    const wordCount = message.split(/\s+/).filter(Boolean).length;
    if (wordCount < SHORT_MESSAGE_WORDS) {
      confidence = Math.min(MAX_CONFIDENCE, confidence + 0.1);
    }

    return { mode: bestMode, confidence: round(confidence), matchedKeywords: bestMatches };
  }

  getPromptHint(): string {
    return `[Current interaction mode appears to be: ${MODE_DESCRIPTIONS[this.#mode]}. Adjust tone and depth accordingly.]`;
  }

  snapshot(): IntentSnapshot {
    return { mode: this.#mode, confidence: this.#confidence, recentSignals: this.recentSignals.map(copySignal) };
  }

  /** Puts back state taken by `snapshot`, e.g. when a turn is withdrawn. */
  restore(snapshot: IntentSnapshot): void {
    this.#mode = snapshot.mode;
    this.#confidence = snapshot.confidence;
    this.#recent = snapshot.recentSignals.slice(-RECENT_SIGNAL_LIMIT).map(copySignal);
  }

  reset(): void {
    this.#mode = DEFAULT_INTENT_MODE;
    this.#confidence = DEFAULT_CONFIDENCE;
    this.#recent = [];
  }

  #applyDecay(): void {
    if (this.#mode === DEFAULT_INTENT_MODE) {
      return;
    }
    this.#confidence = round(this.#confidence - this.#decayRate);
    if (this.#confidence < RESET_FLOOR) {
      this.#mode = DEFAULT_INTENT_MODE;
      this.#confidence = DEFAULT_CONFIDENCE;
    }
  }
}

function copySignal(signal: IntentSignal): IntentSignal {
  return { ...signal, matchedKeywords: [...signal.matchedKeywords] };
}

/** Keeps repeated 0.1 steps from drifting off the decimal grid. */
function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}
