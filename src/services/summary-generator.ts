import type { ChatMessage } from '../core/types.js';
import type { ModelAdapter, ModelRequestOptions } from '../types/model-adapter.js';
import { ProviderError } from '../types/model-adapter.js';
import type { IntentMode, SummaryResult } from '../types/orchestration.js';

export const SUMMARY_SYSTEM_PROMPT = 'You are a precise summarization assistant. Output only valid XML.';
export const DEFAULT_SUMMARY_MAX_TOKENS = 1000;

const REQUIRED_MARKERS = ['<ContextSummary>', '</ContextSummary>', '<GeneralSubject>', '<SpecificContext>'] as const;
const OPEN_TAG = '<ContextSummary>';
const CLOSE_TAG = '</ContextSummary>';

function buildSummaryPrompt(mode: IntentMode, conversation: string): string {
  return `You are a context summarization assistant. Your task is to compress conversation history into a structured XML summary that preserves essential information for continuing the conversation.

Analyze the following conversation and create a summary in this exact XML format:

<ContextSummary>
    <GeneralSubject>The main topic or theme being discussed</GeneralSubject>
    <SpecificContext>
        <Subtopic>Specific areas or aspects being explored</Subtopic>
        <Entities>Key names, concepts, terms, or identifiers mentioned</Entities>
        <KeyPoints>Important facts, decisions, or conclusions reached</KeyPoints>
    </SpecificContext>
    <NextExpectedTopics>What the conversation seems to be heading toward</NextExpectedTopics>
    <UserIntent mode="${mode}">Brief description of user's apparent goal</UserIntent>
</ContextSummary>

Guidelines:
- Be concise but preserve all information needed to continue the conversation
- Include specific names, numbers, and technical terms
- Capture the user's apparent intent and goals
- Note any decisions made or preferences expressed

Conversation to summarize:

${conversation}

Generate only the XML summary, nothing else.`;
}

export function formatTranscript(messages: readonly ChatMessage[]): string {
  return messages.map((message) => `${message.role.toUpperCase()}: ${message.content}`).join('\n\n');
}

/** Trims the reply down to the first `<ContextSummary>` element when one is present. */
export function extractSummaryXml(raw: string): string {
  const trimmed = raw.trim();
  const start = trimmed.indexOf(OPEN_TAG);
  const end = trimmed.indexOf(CLOSE_TAG);
  if (start !== -1 && end !== -1 && end > start) {
    return trimmed.slice(start, end + CLOSE_TAG.length);
  }
  return trimmed;
}

export function isValidSummaryXml(xml: string): boolean {
  return REQUIRED_MARKERS.every((marker) => xml.includes(marker));
}

export interface SummaryRequest {
  messages: readonly ChatMessage[];
  adapter: ModelAdapter;
  intentMode: IntentMode;
  maxTokens?: number;
  options?: ModelRequestOptions;
}

/**
 * One model round trip from a message snapshot to a structured summary. It
 * neither retries nor touches history; callers decide what to do with the result.
 */
export class SummaryGenerator {
  async generate(request: SummaryRequest): Promise<SummaryResult> {
    const messageCount = request.messages.length;
    if (messageCount === 0) {
      return { success: false, error: 'No messages to summarize', rawText: null, messageCount: 0, retryable: false };
    }

    let raw: string;
    try {
      raw = await request.adapter.complete(
        [{ role: 'user', content: buildSummaryPrompt(request.intentMode, formatTranscript(request.messages)) }],
        SUMMARY_SYSTEM_PROMPT,
        request.maxTokens ?? DEFAULT_SUMMARY_MAX_TOKENS,
        request.options,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        error: message,
        rawText: null,
        messageCount,
        retryable: error instanceof ProviderError && error.retryable,
      };
    }

    const xmlSummary = extractSummaryXml(raw);
    if (!isValidSummaryXml(xmlSummary)) {
      return {
        success: false,
        error: 'Generated summary failed validation',
        rawText: raw,
        messageCount,
        retryable: false,
      };
    }

    return { success: true, xmlSummary, messageCount };
  }
}
