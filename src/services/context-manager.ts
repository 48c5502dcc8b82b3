import { logThought } from '../utils/logger.js';
import type {
  ContextBudgetConfig,
  ContextState,
  ContextStatus,
  SummarizationListener,
  SummarizationTrigger,
  SummarizationTriggerReason,
} from '../types/context.js';

export const DEFAULT_CONTEXT_BUDGET_CONFIG: ContextBudgetConfig = {
  contextWindow: 200_000,
  warningThreshold: 0.6,
  criticalThreshold: 0.8,
  minActiveMessages: 4,
};

const MIN_THRESHOLD = 0.01;

export function resolveContextBudgetConfig(
  overrides: Partial<ContextBudgetConfig> = {},
): ContextBudgetConfig {
  const merged: ContextBudgetConfig = { ...DEFAULT_CONTEXT_BUDGET_CONFIG, ...overrides };
  const criticalThreshold = clampThreshold(merged.criticalThreshold, DEFAULT_CONTEXT_BUDGET_CONFIG.criticalThreshold);
  const warningThreshold = Math.min(
    criticalThreshold,
    clampThreshold(merged.warningThreshold, DEFAULT_CONTEXT_BUDGET_CONFIG.warningThreshold),
  );

  return {
    contextWindow: Number.isFinite(merged.contextWindow) ? Math.max(0, Math.floor(merged.contextWindow)) : 0,
    warningThreshold,
    criticalThreshold,
    // the trailing exchange always stays active
    minActiveMessages: Number.isFinite(merged.minActiveMessages)
      ? Math.max(2, Math.floor(merged.minActiveMessages))
      : DEFAULT_CONTEXT_BUDGET_CONFIG.minActiveMessages,
  };
}

/** Clamps into (0, 1]; non-numbers fall back to the default. */
export function clampThreshold(value: number, fallback: number): number {
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(MIN_THRESHOLD, Math.min(1, value));
}

export function classifyContextState(percentage: number, warningThreshold: number, criticalThreshold: number): ContextState {
  if (percentage >= criticalThreshold) {
    return 'critical';
  }
  if (percentage >= warningThreshold) {
    return 'warning';
  }
  return 'normal';
}

/**
 * Owns the token budget state and the decision of whether summarization should
 * run. It only signals listeners; it never calls a model or touches history.
 */
export class ContextManager {
  #config: ContextBudgetConfig;
  #currentTokens = 0;
  #totalMessages = 0;
  #summarizedCount = 0;
  #driftPending = false;
  #listeners: SummarizationListener[] = [];

  constructor(overrides: Partial<ContextBudgetConfig> = {}) {
    this.#config = resolveContextBudgetConfig(overrides);
  }

  get config(): ContextBudgetConfig {
    return { ...this.#config };
  }

  get contextWindow(): number {
    return this.#config.contextWindow;
  }

  set contextWindow(value: number) {
    this.#config = resolveContextBudgetConfig({ ...this.#config, contextWindow: value });
  }

  get criticalThreshold(): number {
    return this.#config.criticalThreshold;
  }

  set criticalThreshold(value: number) {
    this.#config = resolveContextBudgetConfig({ ...this.#config, criticalThreshold: value });
  }

  get warningThreshold(): number {
    return this.#config.warningThreshold;
  }

  set warningThreshold(value: number) {
    this.#config = resolveContextBudgetConfig({ ...this.#config, warningThreshold: value });
  }

  get currentTokens(): number {
    return this.#currentTokens;
  }

  get driftPending(): boolean {
    return this.#driftPending;
  }

  get percentage(): number {
    if (this.#config.contextWindow <= 0) {
      return 0;
    }
    return this.#currentTokens / this.#config.contextWindow;
  }

  get state(): ContextState {
    return classifyContextState(this.percentage, this.#config.warningThreshold, this.#config.criticalThreshold);
  }

  get activeMessages(): number {
    return this.#totalMessages - this.#summarizedCount;
  }

  /** Sets the live count and returns whether summarization should fire now; listeners run first. */
  updateTokenCount(tokens: number): boolean {
    this.#currentTokens = Number.isFinite(tokens) ? Math.max(0, Math.floor(tokens)) : 0;
    const shouldFire = this.shouldSummarize();
    if (shouldFire) {
      this.#notify(this.state === 'critical' ? 'critical' : 'drift');
    }
    return shouldFire;
  }

  updateMessageCounts(totalMessages: number, summarizedMessages: number = this.#summarizedCount): void {
    this.#totalMessages = Math.max(0, totalMessages);
    this.#summarizedCount = Math.max(0, Math.min(this.#totalMessages, summarizedMessages));
  }

  /**
   * Records a drift signal. Drift is secondary: it only fires under token
   * pressure (warning or critical) and with enough active messages. With
   * `notify: false` the signal is only recorded, for when a trigger already
   * went out for the same update.
   */
  signalDrift(detected: boolean, options: { notify?: boolean } = {}): boolean {
    if (!detected) {
      return false;
    }
    this.#driftPending = true;
    if (options.notify === false) {
      return false;
    }
    if (this.state === 'normal' || this.activeMessages < this.#config.minActiveMessages) {
      return false;
    }
    this.#notify('drift');
    return true;
  }

  clearDrift(): void {
    this.#driftPending = false;
  }

  shouldSummarize(): boolean {
    if (this.activeMessages < this.#config.minActiveMessages) {
      return false;
    }
    const state = this.state;
    if (state === 'critical') {
      return true;
    }
    return this.#driftPending && state === 'warning';
  }

  markSummarized(count: number): void {
    this.#summarizedCount = Math.max(0, Math.min(this.#totalMessages, count));
    this.#driftPending = false;
  }

  /** Registers a listener; the returned function unregisters it. */
  onSummarize(listener: SummarizationListener): () => void {
    this.#listeners.push(listener);
    return () => {
      this.#listeners = this.#listeners.filter((entry) => entry !== listener);
    };
  }

  getStatus(): ContextStatus {
    return {
      currentTokens: this.#currentTokens,
      windowSize: this.#config.contextWindow,
      percentage: this.percentage,
      state: this.state,
      totalMessages: this.#totalMessages,
      summarizedMessages: this.#summarizedCount,
      activeMessages: this.activeMessages,
      driftPending: this.#driftPending,
    };
  }

  reset(): void {
    this.#currentTokens = 0;
    this.#totalMessages = 0;
    this.#summarizedCount = 0;
    this.#driftPending = false;
  }

  #notify(reason: SummarizationTriggerReason): void {
    const trigger: SummarizationTrigger = { reason, status: this.getStatus() };
    for (const listener of [...this.#listeners]) {
      try {
        listener(trigger);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        void logThought(`[ContextManager] Summarization listener threw: ${message}`);
      }
    }
  }
}
