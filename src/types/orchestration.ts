export type IntentMode = 'exploration' | 'analysis' | 'drafting' | 'adversarial';

export interface IntentSignal {
  mode: IntentMode;
  confidence: number;
  matchedKeywords: string[];
}

export interface IntentState {
  mode: IntentMode;
  confidence: number;
}

export interface IntentSnapshot extends IntentState {
  recentSignals: IntentSignal[];
}

export interface DriftResult {
  isDrift: boolean;
  similarity: number;
  currentKeywords: Set<string>;
  centroidKeywords: Set<string>;
}

export interface Waypoint {
  messageIndex: number;
  createdAt: Date;
}

export type SummaryResult =
  | { success: true; xmlSummary: string; messageCount: number }
  | { success: false; error: string; rawText: string | null; messageCount: number; retryable: boolean };

export type ArtifactKind = 'outline' | 'decisions' | 'research';

export interface GeneratedArtifact {
  kind: ArtifactKind;
  title: string;
  content: string;
}

export interface ArtifactBatch {
  artifacts: GeneratedArtifact[];
  failures: Array<{ kind: ArtifactKind; error: string }>;
}

export type TocEntryKind = 'auto' | 'waypoint' | 'heading';

export interface TocEntry {
  /** Stable anchor such as `heading-4` or `waypoint-2`. */
  id: string;
  title: string;
  messageIndex: number;
  /** 1 for sections, 2 for questions nested under them. */
  level: 1 | 2;
  kind: TocEntryKind;
  createdAt: Date;
}
