import type { TokenUsage } from '../core/types.js';
import type { ContextStatus, SummarizationTriggerReason } from './context.js';
import type { IntentMode } from './orchestration.js';

export type TurnOutcome = 'completed' | 'interrupted' | 'rolled_back' | 'failed' | 'rejected';

export interface TurnResult {
  outcome: TurnOutcome;
  /** Text committed to history for this turn; empty when nothing was committed. */
  text: string;
  committed: boolean;
  error?: string;
  usage?: TokenUsage;
}

export interface SendOptions {
  onChunk?: (text: string) => void;
  signal?: AbortSignal;
}

export type SummarizationRefusal = 'stream_in_flight' | 'already_running' | 'nothing_to_summarize';

export type ControllerEvent =
  | { type: 'summarization_started'; reason: SummarizationTriggerReason | 'manual'; boundary: number; messageCount: number }
  | { type: 'summarization_completed'; summarizedUpTo: number; messageCount: number }
  | { type: 'summarization_failed'; error: string }
  | { type: 'summarization_refused'; reason: SummarizationRefusal }
  | { type: 'retrieval_failed'; error: string }
  | { type: 'persistence_failed'; error: string };

export type ControllerListener = (event: ControllerEvent) => void;

export interface ControllerStatus extends ContextStatus {
  sessionId: string;
  modelId: string;
  intentMode: IntentMode;
  intentConfidence: number;
  hasSummary: boolean;
  summarizing: boolean;
  streaming: boolean;
  waypointCount: number;
  lastUsage: TokenUsage | null;
}

export type ControllerActionResult = { ok: true } | { ok: false; error: string };
