export type ContextState = 'normal' | 'warning' | 'critical';

export interface ContextBudgetConfig {
  contextWindow: number;
  warningThreshold: number;
  criticalThreshold: number;
  /** Summarization never fires with fewer unsummarized messages than this. */
  minActiveMessages: number;
}

/** Read-only snapshot for status displays. Derived, never stored. */
export interface ContextStatus {
  currentTokens: number;
  windowSize: number;
  percentage: number;
  state: ContextState;
  totalMessages: number;
  summarizedMessages: number;
  activeMessages: number;
  driftPending: boolean;
}

export type SummarizationTriggerReason = 'critical' | 'drift';

export interface SummarizationTrigger {
  reason: SummarizationTriggerReason;
  status: ContextStatus;
}

export type SummarizationListener = (trigger: SummarizationTrigger) => void;
