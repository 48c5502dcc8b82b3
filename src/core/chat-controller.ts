import { randomUUID } from 'node:crypto';
import * as path from 'path';
import type { LodestarConfig } from '../config/json-config.js';
import { getArtifactsDir, getExportsDir } from '../config/workspace.js';
import { ArtifactGenerator } from '../services/artifact-generator.js';
import { ContextManager } from '../services/context-manager.js';
import type { IndexedMessage } from '../services/conversation-history.js';
import { DriftDetector } from '../services/drift-detector.js';
import { IntentTracker } from '../services/intent-tracker.js';
import { exportFileName, saveMarkdownExport } from '../services/markdown-export.js';
import { buildSideSystemPrompt, ParallelContextManager, type SideConversation } from '../services/parallel-context.js';
import { PromptBuilder } from '../services/prompt-builder.js';
import type { SessionStore } from '../services/session-store.js';
import { SummaryGenerator } from '../services/summary-generator.js';
import { TocGenerator } from '../services/toc-generator.js';
import { TokenCounter } from '../services/token-counter.js';
import { WaypointManager } from '../services/waypoint-manager.js';
import type { SummarizationTriggerReason } from '../types/context.js';
import type {
  ControllerActionResult,
  ControllerEvent,
  ControllerListener,
  ControllerStatus,
  SendOptions,
  TurnResult,
} from '../types/controller.js';
import type { ModelAdapter } from '../types/model-adapter.js';
import type {
  ArtifactBatch,
  ArtifactKind,
  IntentMode,
  IntentSnapshot,
  SummaryResult,
  TocEntry,
  Waypoint,
} from '../types/orchestration.js';
import type { RetrievedChunk, Retriever } from '../types/retrieval.js';
import type { SessionRecord } from '../types/session.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { withTimeout } from '../utils/timeout.js';
import { AsyncLock } from './async-lock.js';
import type { ModelSpec, PromptMessage, TokenUsage } from './types.js';

const TITLE_MAX_CHARS = 60;

export interface ChatControllerOptions {
  adapter: ModelAdapter;
  model: ModelSpec;
  config: LodestarConfig;
  systemPrompt?: string;
  retriever?: Retriever | null;
  sessionStore?: SessionStore | null;
  summaryGenerator?: SummaryGenerator;
  artifactGenerator?: ArtifactGenerator;
  /** Base delay between summarization attempts on transient provider errors. */
  retryBaseDelayMs?: number;
  now?: () => Date;
}

/** What a user message changes before its reply exists. */
interface TurnContext {
  intent: IntentSnapshot;
  intentHint: string | null;
  ragChunks: RetrievedChunk[];
}

interface AbortScope {
  controller: AbortController;
  detach: () => void;
}

interface StreamOutcome {
  text: string;
  usage?: TokenUsage;
  failure: string | null;
  interrupted: boolean;
}

/** A fresh controller that also aborts when `external` does, until detached. */
function linkAbort(external?: AbortSignal): AbortScope {
  const controller = new AbortController();
  if (!external) {
    return { controller, detach: () => undefined };
  }
  if (external.aborted) {
    controller.abort();
    return { controller, detach: () => undefined };
  }
  const onAbort = (): void => controller.abort();
  external.addEventListener('abort', onAbort, { once: true });
  return { controller, detach: () => external.removeEventListener('abort', onAbort) };
}

/** Text means something was committed; no text means the turn is withdrawn. */
function settleTurn(stream: StreamOutcome, modelId: string): TurnResult {
  const { text, usage, failure, interrupted } = stream;
  if (text) {
    if (failure) return { outcome: 'failed', text, committed: true, error: failure, usage };
    return { outcome: interrupted ? 'interrupted' : 'completed', text, committed: true, usage };
  }
  if (interrupted) return { outcome: 'rolled_back', text: '', committed: false };
  return {
    outcome: 'failed',
    text: '',
    committed: false,
    error: failure ?? `${modelId} returned an empty response.`,
  };
}

/** Raised inside the retry loop so only retryable provider failures are attempted again. */
class TransientSummaryFailure extends Error {
  readonly result: SummaryResult;

  constructor(result: SummaryResult, message: string) {
    super(message);
    this.name = 'TransientSummaryFailure';
    this.result = result;
  }
}

function errorMessage(error: unknown): string {
  return scrubSensitiveText(error instanceof Error ? error.message : String(error));
}

/**
 * Wires the context components together for each turn and enforces the
 * locking rules: one stream at a time, one summarization at a time, and
 * retrieval serialized with index mutations. Summarization runs in the
 * background and never surfaces inside the user's turn.
 */
export class ChatController {
  readonly #config: LodestarConfig;
  readonly #retriever: Retriever | null;
  readonly #sessionStore: SessionStore | null;
  readonly #summaryGenerator: SummaryGenerator;
  readonly #artifactGenerator: ArtifactGenerator;
  readonly #retryBaseDelayMs: number;
  readonly #now: () => Date;

  readonly #prompt: PromptBuilder;
  readonly #contextManager: ContextManager;
  readonly #drift: DriftDetector;
  readonly #intent: IntentTracker;
  readonly #waypoints = new WaypointManager();

  readonly #streamingLock = new AsyncLock('streaming');
  readonly #summarizationLock = new AsyncLock('summarization');
  readonly #indexingLock = new AsyncLock('indexing');
  readonly #sideLock = new AsyncLock('side');
  readonly #side: ParallelContextManager;

  #adapter: ModelAdapter;
  #model: ModelSpec;
  #tokenCounter: TokenCounter;
  #listeners: ControllerListener[] = [];
  #unsubscribe: () => void;
  #streamInFlight = false;
  #activeAbort: AbortController | null = null;
  #pendingSummarization: Promise<void> | null = null;
  #lastUsage: TokenUsage | null = null;
  #sessionId: string = randomUUID();
  #createdAt: Date;
  #modelsUsed = new Set<string>();

  constructor(options: ChatControllerOptions) {
    this.#config = options.config;
    this.#adapter = options.adapter;
    this.#model = options.model;
    this.#retriever = options.retriever ?? null;
    this.#sessionStore = options.sessionStore ?? null;
    this.#summaryGenerator = options.summaryGenerator ?? new SummaryGenerator();
    this.#artifactGenerator = options.artifactGenerator ?? new ArtifactGenerator();
    this.#retryBaseDelayMs = Math.max(0, options.retryBaseDelayMs ?? 1000);
    this.#now = options.now ?? (() => new Date());
    this.#createdAt = this.#now();
    this.#side = new ParallelContextManager(this.#now);

    this.#prompt = new PromptBuilder(options.systemPrompt);
    this.#tokenCounter = new TokenCounter(options.model.id);
    this.#contextManager = new ContextManager({
      contextWindow: options.model.contextWindow,
      warningThreshold: options.config.context.warningThreshold,
      criticalThreshold: options.config.context.criticalThreshold,
      minActiveMessages: options.config.context.minActiveMessages,
    });
    this.#drift = new DriftDetector({
      windowSize: options.config.drift.windowSize,
      threshold: options.config.drift.threshold,
    });
    this.#intent = new IntentTracker({ decayRate: options.config.intent.decayRate });
    this.#modelsUsed.add(options.model.id);

    this.#unsubscribe = this.#contextManager.onSummarize((trigger) => {
      this.#startSummarization(trigger.reason);
    });
    this.#refreshTokens();
  }

  get sessionId(): string {
    return this.#sessionId;
  }

  get model(): ModelSpec {
    return this.#model;
  }

  get prompt(): PromptBuilder {
    return this.#prompt;
  }

  get contextManager(): ContextManager {
    return this.#contextManager;
  }

  get isStreaming(): boolean {
    return this.#streamInFlight;
  }

  onEvent(listener: ControllerListener): () => void {
    this.#listeners.push(listener);
    return () => {
      this.#listeners = this.#listeners.filter((entry) => entry !== listener);
    };
  }

  // ── Turns ──────────────────────────────────────────────────────────────────

  /** Runs one user turn. A second call queues behind the first. */
  async sendMessage(text: string, options: SendOptions = {}): Promise<TurnResult> {
    const content = text.trim();
    if (!content) {
      return { outcome: 'rejected', text: '', committed: false, error: 'Message is empty.' };
    }

    const release = await this.#streamingLock.acquire();
    const scope = this.#beginAbortScope(options.signal);
    try {
      const before = this.#captureTurnContext();
      await this.#refreshRetrieval(content);

      // From here to the stream everything is synchronous, so a trigger raised
      // by this message is handled before the reply is requested.
      this.#intent.update(content);
      this.#prompt.setIntentHint(this.#intent.getPromptHint());
      const drift = this.#drift.analyze(content);
      this.#prompt.history.addUser(content);
      this.#syncMessageCounts();
      const fired = this.#refreshTokens();
      this.#contextManager.signalDrift(drift.isDrift, { notify: !fired });

      await this.#summarizationLock.waitUntilFree();
      const result = await this.#streamReply(scope.controller, options.onChunk);

      if (!result.committed) {
        this.#prompt.history.removeLastUser();
        this.#waypoints.discardFrom(this.#prompt.history.length);
        this.#restoreTurnContext(before);
        this.#rebaselineDrift();
        this.#syncMessageCounts();
        this.#refreshTokens();
      }

      await this.#autosave();
      return result;
    } finally {
      this.#endAbortScope(scope);
      release();
    }
  }

  /** Cancels the in-flight stream, if any. */
  interrupt(): boolean {
    if (!this.#activeAbort || this.#activeAbort.signal.aborted) {
      return false;
    }
    this.#activeAbort.abort();
    return true;
  }

  /**
   * Drops the trailing assistant reply and asks again. When the new attempt
   * produces nothing, the previous reply is put back.
   */
  async regenerate(options: SendOptions = {}): Promise<TurnResult> {
    const release = await this.#streamingLock.acquire();
    const scope = this.#beginAbortScope(options.signal);
    try {
      const previous = this.#prompt.history.last();
      if (!previous || previous.role !== 'assistant' || !this.#prompt.history.removeLastAssistant()) {
        return { outcome: 'rejected', text: '', committed: false, error: 'Nothing to regenerate.' };
      }
      this.#syncMessageCounts();
      this.#refreshTokens();

      await this.#summarizationLock.waitUntilFree();
      const result = await this.#streamReply(scope.controller, options.onChunk);

      if (!result.committed) {
        this.#prompt.history.addAssistant(previous.content);
        this.#syncMessageCounts();
        this.#refreshTokens();
      }

      await this.#autosave();
      return result;
    } finally {
      this.#endAbortScope(scope);
      release();
    }
  }

  /** Removes the trailing user+assistant exchange. Refused while a response is streaming. */
  async rollback(): Promise<ControllerActionResult> {
    const release = this.#streamingLock.tryAcquire();
    if (!release) {
      return { ok: false, error: 'A response is in progress.' };
    }
    try {
      await this.#summarizationLock.waitUntilFree();
      if (!this.#prompt.history.removeLastExchange()) {
        return { ok: false, error: 'No complete exchange to roll back.' };
      }
      this.#waypoints.discardFrom(this.#prompt.history.length);
      this.#rebaselineDrift();
      this.#syncMessageCounts();
      this.#refreshTokens();
      await this.#autosave();
      return { ok: true };
    } finally {
      release();
    }
  }

  // ── Waypoints, memory, retrieval ───────────────────────────────────────────

  /** Marks the latest message as a preferred summarization stop point. */
  placeWaypoint(): Waypoint | null {
    const index = this.#prompt.history.length - 1;
    if (index < 0) {
      return null;
    }
    return this.#waypoints.add(index, this.#now());
  }

  removeWaypoint(index: number): boolean {
    return this.#waypoints.remove(index);
  }

  listWaypoints(): Waypoint[] {
    return this.#waypoints.list();
  }

  setMemory(text: string): void {
    this.#prompt.setMemory(text);
    this.#refreshTokens();
  }

  clearMemory(): void {
    this.#prompt.clearMemory();
    this.#refreshTokens();
  }

  setScratchpad(text: string): void {
    this.#prompt.setScratchpad(text);
    this.#refreshTokens();
  }

  clearScratchpad(): void {
    this.#prompt.clearScratchpad();
    this.#refreshTokens();
  }

  /** Runs a document-index mutation serialized against retrieval and other mutations. */
  runIndexMutation<T>(mutation: () => Promise<T>): Promise<T> {
    return this.#indexingLock.run(mutation);
  }

  // ── Model and session lifecycle ────────────────────────────────────────────

  async setModel(adapter: ModelAdapter, model: ModelSpec): Promise<void> {
    const release = await this.#streamingLock.acquire();
    try {
      this.#adapter = adapter;
      this.#model = model;
      this.#tokenCounter = new TokenCounter(model.id);
      this.#contextManager.contextWindow = model.contextWindow;
      this.#modelsUsed.add(model.id);
      this.#refreshTokens();
    } finally {
      release();
    }
  }

  async newConversation(): Promise<void> {
    const release = await this.#streamingLock.acquire();
    try {
      await this.#summarizationLock.waitUntilFree();
      this.#prompt.reset();
      this.#side.clear();
      this.#waypoints.clear();
      this.#drift.reset();
      this.#intent.reset();
      this.#contextManager.reset();
      this.#lastUsage = null;
      this.#startNewSession();
      this.#refreshTokens();
    } finally {
      release();
    }
  }

  /** Continues under a new session id with the raw messages kept and the summary dropped. */
  async fork(): Promise<string> {
    const release = await this.#streamingLock.acquire();
    try {
      await this.#summarizationLock.waitUntilFree();
      this.#prompt.history.resetCursor();
      this.#prompt.clearSummary();
      this.#contextManager.reset();
      this.#syncMessageCounts();
      this.#rebaselineDrift();
      this.#startNewSession();
      this.#refreshTokens();
      await this.#autosave();
      return this.#sessionId;
    } finally {
      release();
    }
  }

  buildSessionRecord(): SessionRecord {
    const messages = this.#prompt.history.getAll().map(({ role, content }) => ({ role, content }));
    const firstUser = messages.find((message) => message.role === 'user');
    const title = firstUser
      ? firstUser.content.replace(/\s+/g, ' ').slice(0, TITLE_MAX_CHARS)
      : 'New conversation';
    return {
      sessionId: this.#sessionId,
      title,
      messages,
      summaryXml: this.#prompt.getSummary(),
      summarizedUpTo: this.#prompt.history.summarizedUpTo,
      waypoints: this.#waypoints.toRecords(),
      tokenCount: this.#contextManager.currentTokens,
      modelsUsed: [...this.#modelsUsed],
      createdAt: this.#createdAt.toISOString(),
      updatedAt: this.#now().toISOString(),
    };
  }

  /** Persists the current session. Failures are reported, never thrown. */
  async saveSession(): Promise<ControllerActionResult> {
    if (!this.#sessionStore) {
      return { ok: false, error: 'No session store configured.' };
    }
    try {
      this.#sessionStore.saveSession(this.buildSessionRecord());
      return { ok: true };
    } catch (error) {
      const message = errorMessage(error);
      void logThought(`[SessionStore] Failed to save session ${this.#sessionId}: ${message}`);
      this.#emit({ type: 'persistence_failed', error: message });
      return { ok: false, error: message };
    }
  }

  async restoreSession(record: SessionRecord): Promise<void> {
    const release = await this.#streamingLock.acquire();
    try {
      await this.#summarizationLock.waitUntilFree();
      this.#prompt.reset();
      this.#side.clear();
      this.#prompt.history.restore(record.messages, record.summarizedUpTo);
      if (record.summaryXml) {
        this.#prompt.setSummary(record.summaryXml);
      }
      this.#waypoints.restore(record.waypoints);
      this.#intent.reset();
      this.#contextManager.reset();
      this.#syncMessageCounts();
      this.#rebaselineDrift();
      this.#sessionId = record.sessionId;
      const createdAt = new Date(record.createdAt);
      this.#createdAt = Number.isNaN(createdAt.getTime()) ? this.#now() : createdAt;
      this.#modelsUsed = new Set([...record.modelsUsed, this.#model.id]);
      this.#refreshTokens();
    } finally {
      release();
    }
  }

  // ── Side conversations ─────────────────────────────────────────────────────

  get sideConversation(): SideConversation | null {
    return this.#side.active;
  }

  /** Opens a side thread; one already open is archived without merging. */
  startSideConversation(): SideConversation {
    return this.#side.start();
  }

  /**
   * One exchange in the open side thread, with the main summary and the
   * current retrieval block as context. Main history, token budget and
   * summarization are untouched.
   */
  async askSide(text: string, options: SendOptions = {}): Promise<TurnResult> {
    const content = text.trim();
    if (!content) {
      return { outcome: 'rejected', text: '', committed: false, error: 'Message is empty.' };
    }

    const release = await this.#sideLock.acquire();
    const scope = linkAbort(options.signal);
    try {
      const side = this.#side.active;
      if (!side) {
        return { outcome: 'rejected', text: '', committed: false, error: 'No side conversation is open.' };
      }
      side.addMessage('user', content, this.#now());

      const retrieval = this.#prompt.getRagContext();
      const messages: PromptMessage[] = retrieval
        ? [{ role: 'user', content: retrieval }, ...side.buildMessages()]
        : side.buildMessages();
      const stream = await this.#consumeStream(
        messages,
        buildSideSystemPrompt(this.#prompt.getSummary()),
        scope.controller,
        options.onChunk,
      );

      if (stream.text) {
        side.addMessage('assistant', stream.text, this.#now());
      } else {
        side.removeLastUser();
      }
      return settleTurn(stream, this.#model.id);
    } finally {
      scope.detach();
      release();
    }
  }

  /** Closes the side thread. A merged digest joins the main prompt as a context note. */
  endSideConversation(merge = false): string | null {
    const summary = this.#side.end(merge);
    if (summary) {
      this.#prompt.addSideNote(summary);
      this.#refreshTokens();
    }
    return summary;
  }

  // ── Outline and export ─────────────────────────────────────────────────────

  /** Outline of the whole conversation, summarized turns and live waypoints included. */
  getTableOfContents(): TocEntry[] {
    const toc = new TocGenerator({ now: this.#now });
    for (const waypoint of this.#waypoints.list()) {
      toc.addWaypoint(waypoint.messageIndex, { createdAt: waypoint.createdAt });
    }
    return toc.rebuildFromMessages(this.#prompt.history.getAll());
  }

  /** Writes the full transcript as markdown and returns the file path. */
  exportMarkdown(outputDir: string = getExportsDir()): Promise<string> {
    const exportedAt = this.#now();
    return saveMarkdownExport(path.join(outputDir, exportFileName(undefined, exportedAt)), {
      messages: this.#prompt.history.getAll(),
      modelsUsed: [...this.#modelsUsed],
      tokenCount: this.#contextManager.currentTokens,
      sessionId: this.#sessionId,
      exportedAt,
    });
  }

  // ── Summarization and artifacts ────────────────────────────────────────────

  /** Manual trigger, subject to the same refusal rules as automatic ones. */
  summarizeNow(): boolean {
    return this.#startSummarization('manual');
  }

  /** Resolves once no summarization is in flight. */
  async whenIdle(): Promise<void> {
    while (this.#pendingSummarization) {
      await this.#pendingSummarization;
    }
  }

  async generateArtifacts(kinds: readonly ArtifactKind[] = this.#config.artifacts.kinds): Promise<ArtifactBatch> {
    const messages = this.#prompt.history.getAll();
    const adapter = this.#adapter;
    try {
      return await withTimeout(
        (signal) => this.#artifactGenerator.generate({
          messages,
          adapter,
          kinds,
          maxTokens: this.#config.artifacts.maxOutputTokens,
          options: { signal },
        }),
        this.#config.artifacts.timeoutMs,
        'Artifact generation',
      );
    } catch (error) {
      const message = errorMessage(error);
      void logThought(`[Artifacts] Generation failed: ${message}`);
      return { artifacts: [], failures: kinds.map((kind) => ({ kind, error: message })) };
    }
  }

  saveArtifacts(batch: ArtifactBatch, outputDir: string = getArtifactsDir()): Promise<string[]> {
    return this.#artifactGenerator.save(batch.artifacts, this.#sessionId, outputDir, this.#now());
  }

  getStatus(): ControllerStatus {
    return {
      ...this.#contextManager.getStatus(),
      sessionId: this.#sessionId,
      modelId: this.#model.id,
      intentMode: this.#intent.mode,
      intentConfidence: this.#intent.confidence,
      hasSummary: this.#prompt.getSummary() !== null,
      summarizing: this.#summarizationLock.isLocked(),
      streaming: this.#streamInFlight,
      waypointCount: this.#waypoints.count,
      lastUsage: this.#lastUsage,
    };
  }

  dispose(): void {
    this.#unsubscribe();
    this.#listeners = [];
    this.interrupt();
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  async #streamReply(abort: AbortController, onChunk?: (text: string) => void): Promise<TurnResult> {
    let stream: StreamOutcome;
    this.#streamInFlight = true;
    try {
      stream = await this.#consumeStream(this.#prompt.buildMessages(), this.#prompt.getSystemPrompt(), abort, onChunk);
    } finally {
      this.#streamInFlight = false;
    }

    if (stream.usage) this.#lastUsage = stream.usage;
    if (stream.text) {
      this.#prompt.history.addAssistant(stream.text);
      this.#syncMessageCounts();
      this.#refreshTokens();
    }
    return settleTurn(stream, this.#model.id);
  }

  /** Drains one adapter stream. Provider errors are captured, never thrown. */
  async #consumeStream(
    messages: PromptMessage[],
    system: string,
    abort: AbortController,
    onChunk?: (text: string) => void,
  ): Promise<StreamOutcome> {
    let text = '';
    let usage: TokenUsage | undefined;
    let failure: string | null = null;

    try {
      const stream = this.#adapter.stream(
        messages,
        system,
        Math.min(this.#config.streaming.maxTokens, this.#model.maxOutputTokens),
        { signal: abort.signal },
      );
      for await (const chunk of stream) {
        if (abort.signal.aborted) break;
        if (chunk.text) {
          text += chunk.text;
          onChunk?.(chunk.text);
        }
        if (chunk.usage) usage = chunk.usage;
      }
    } catch (error) {
      if (!abort.signal.aborted) {
        failure = errorMessage(error);
        void logThought(`[Controller] Stream from ${this.#model.id} failed: ${failure}`);
      }
    }

    return { text, usage, failure, interrupted: abort.signal.aborted };
  }

  #captureTurnContext(): TurnContext {
    return {
      intent: this.#intent.snapshot(),
      intentHint: this.#prompt.getIntentHint(),
      ragChunks: this.#prompt.getRagChunks(),
    };
  }

  /** Undoes what a withdrawn message did to intent and the retrieval block. */
  #restoreTurnContext(context: TurnContext): void {
    this.#intent.restore(context.intent);
    if (context.intentHint === null) {
      this.#prompt.clearIntentHint();
    } else {
      this.#prompt.setIntentHint(context.intentHint);
    }
    this.#prompt.setRagContext(context.ragChunks);
  }

  async #refreshRetrieval(query: string): Promise<void> {
    if (!this.#retriever) return;
    const retriever = this.#retriever;
    try {
      const chunks = await this.#indexingLock.run(() => retriever.retrieve(query, this.#config.retrieval.topK));
      this.#prompt.setRagContext(chunks);
    } catch (error) {
      const message = errorMessage(error);
      this.#prompt.clearRagContext();
      void logThought(`[Controller] Retrieval failed; continuing without document context: ${message}`);
      this.#emit({ type: 'retrieval_failed', error: message });
    }
  }

  /**
   * Takes the snapshot and boundary synchronously, then runs the model call in
   * the background. Refused while chunks are being consumed or another run
   * holds the lock; the next trigger tries again.
   */
  #startSummarization(reason: SummarizationTriggerReason | 'manual'): boolean {
    if (this.#streamInFlight) {
      this.#emit({ type: 'summarization_refused', reason: 'stream_in_flight' });
      return false;
    }
    const release = this.#summarizationLock.tryAcquire();
    if (!release) {
      this.#emit({ type: 'summarization_refused', reason: 'already_running' });
      return false;
    }

    const history = this.#prompt.history;
    const minKeep = this.#contextManager.config.minActiveMessages;
    const waypointBoundary = this.#waypoints.getBoundary(history.length, minKeep);
    const boundary = waypointBoundary !== null && waypointBoundary >= history.summarizedUpTo
      ? waypointBoundary
      : history.length - minKeep - 1;
    const snapshot = history.getMessagesForSummarization(boundary);
    const highest = snapshot[snapshot.length - 1];
    if (!highest) {
      release();
      this.#emit({ type: 'summarization_refused', reason: 'nothing_to_summarize' });
      return false;
    }

    this.#emit({ type: 'summarization_started', reason, boundary: highest.index, messageCount: snapshot.length });
    const run = this.#runSummarization(snapshot, highest.index, this.#intent.mode, this.#adapter)
      .catch((error: unknown) => {
        const message = errorMessage(error);
        void logThought(`[Summary] Unexpected summarization error: ${message}`);
        this.#emit({ type: 'summarization_failed', error: message });
      })
      .finally(() => {
        release();
        if (this.#pendingSummarization === run) {
          this.#pendingSummarization = null;
        }
      });
    this.#pendingSummarization = run;
    return true;
  }

  async #runSummarization(
    snapshot: IndexedMessage[],
    highestIndex: number,
    intentMode: IntentMode,
    adapter: ModelAdapter,
  ): Promise<void> {
    const settings = this.#config.summarization;
    const attempt = await withRetry(
      async () => {
        const result = await withTimeout(
          (signal) => this.#summaryGenerator.generate({
            messages: snapshot,
            adapter,
            intentMode,
            maxTokens: settings.maxOutputTokens,
            options: { signal },
          }),
          settings.timeoutMs,
          'Summary generation',
        );
        if (!result.success && result.retryable) {
          throw new TransientSummaryFailure(result, result.error);
        }
        return result;
      },
      {
        maxAttempts: settings.maxAttempts,
        baseDelayMs: this.#retryBaseDelayMs,
        shouldRetry: (error) => error instanceof TransientSummaryFailure,
        label: 'summary:generate',
      },
    );

    if (!attempt.ok) {
      this.#reportSummaryFailure(attempt.error);
      return;
    }
    const result = attempt.value;
    if (!result.success) {
      const detail = result.rawText ? ` Raw response: ${result.rawText.slice(0, 200)}` : '';
      this.#reportSummaryFailure(`${result.error}.${detail}`);
      return;
    }

    this.#prompt.setSummary(result.xmlSummary);
    this.#prompt.history.markSummarized(highestIndex + 1);
    this.#contextManager.markSummarized(this.#prompt.history.summarizedUpTo);
    this.#waypoints.clearSummarizedPast(highestIndex);
    this.#rebaselineDrift();
    this.#syncMessageCounts();

    void logThought(
      `[Summary] Summarized ${result.messageCount} messages; cursor now ${this.#prompt.history.summarizedUpTo}.`,
    );
    this.#emit({
      type: 'summarization_completed',
      summarizedUpTo: this.#prompt.history.summarizedUpTo,
      messageCount: result.messageCount,
    });
    this.#refreshTokens();
    if (!this.#streamingLock.isLocked()) {
      await this.#autosave();
    }
  }

  #reportSummaryFailure(message: string): void {
    const scrubbed = scrubSensitiveText(message);
    void logThought(`[Summary] Summarization failed; keeping previous context: ${scrubbed}`);
    this.#emit({ type: 'summarization_failed', error: scrubbed });
  }

  #refreshTokens(): boolean {
    const tokens = this.#tokenCounter.countPrompt(this.#prompt.getSystemPrompt(), this.#prompt.buildMessages());
    return this.#contextManager.updateTokenCount(tokens);
  }

  #syncMessageCounts(): void {
    const history = this.#prompt.history;
    this.#contextManager.updateMessageCounts(history.length, history.summarizedUpTo);
  }

  #rebaselineDrift(): void {
    this.#drift.recalculate(this.#prompt.history.getActiveMessages().map((message) => message.content));
  }

  #startNewSession(): void {
    this.#sessionId = randomUUID();
    this.#createdAt = this.#now();
    this.#modelsUsed = new Set([this.#model.id]);
  }

  async #autosave(): Promise<void> {
    if (!this.#sessionStore || this.#prompt.history.length === 0) return;
    await this.saveSession();
  }

  #beginAbortScope(external?: AbortSignal): AbortScope {
    const scope = linkAbort(external);
    this.#activeAbort = scope.controller;
    return scope;
  }

  #endAbortScope(scope: AbortScope): void {
    scope.detach();
    if (this.#activeAbort === scope.controller) {
      this.#activeAbort = null;
    }
  }

  #emit(event: ControllerEvent): void {
    for (const listener of [...this.#listeners]) {
      try {
        listener(event);
      } catch (error) {
        void logThought(`[Controller] Event listener threw: ${errorMessage(error)}`);
      }
    }
  }
}
