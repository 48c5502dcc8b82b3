import type { ModelSpec, PromptMessage, StreamChunk, TokenUsage } from '../core/types.js';
import { isReasoningModel } from '../config/models.js';
import { ProviderError, type ModelAdapter, type ModelRequestOptions } from '../types/model-adapter.js';
import { readArray, readNumber, readRecord, readString, tryParseJson } from '../utils/json.js';
import { scrubSensitiveText } from '../utils/logger.js';
import { readSseEvents } from '../utils/sse.js';

export interface OpenAiCompatibleAdapterOptions {
  model: ModelSpec;
  apiKey: string;
  baseUrl: string;
  /** Attribution headers sent to OpenRouter. */
  appName?: string;
  appUrl?: string;
}

interface WireMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

function readUsage(payload: unknown): TokenUsage | null {
  const usage = readRecord(payload, 'usage');
  if (!usage) return null;
  return {
    inputTokens: readNumber(usage, 'prompt_tokens') ?? 0,
    outputTokens: readNumber(usage, 'completion_tokens') ?? 0,
  };
}

/**
 * Chat-completions adapter for OpenAI and OpenRouter. Reasoning models take
 * the system prompt as a leading user note and are answered in one chunk.
 */
export class OpenAiCompatibleAdapter implements ModelAdapter {
  readonly modelId: string;
  readonly provider: 'openai' | 'openrouter';
  readonly #apiKey: string;
  readonly #endpoint: string;
  readonly #extraHeaders: Record<string, string>;
  readonly #reasoning: boolean;

  constructor(options: OpenAiCompatibleAdapterOptions) {
    if (options.model.provider === 'anthropic') {
      throw new ProviderError('anthropic', `Model ${options.model.id} is not served over chat completions.`, { retryable: false });
    }
    this.modelId = options.model.id;
    this.provider = options.model.provider;
    this.#apiKey = options.apiKey;
    this.#endpoint = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    this.#reasoning = this.provider === 'openai' && isReasoningModel(this.modelId);
    this.#extraHeaders = this.provider === 'openrouter'
      ? { 'X-Title': options.appName ?? 'Lodestar', ...(options.appUrl ? { 'HTTP-Referer': options.appUrl } : {}) }
      : {};
  }

  async *stream(
    messages: PromptMessage[],
    system: string,
    maxTokens: number,
    options: ModelRequestOptions = {},
  ): AsyncIterable<StreamChunk> {
    if (this.#reasoning) {
      const payload = await this.#request(this.#buildBody(messages, system, maxTokens, false), options);
      yield { text: this.#readCompletionText(payload), isFinal: false };
      yield { text: '', isFinal: true, usage: readUsage(payload) ?? undefined };
      return;
    }

    const response = await this.#send(this.#buildBody(messages, system, maxTokens, true), options);
    if (!response.body) {
      throw new ProviderError(this.provider, `${this.modelId} returned an empty stream body.`);
    }

    let finalSent = false;
    try {
      for await (const event of readSseEvents(response.body)) {
        if (event.data === '[DONE]') break;
        const payload = tryParseJson(event.data);
        if (payload === null) continue;

        const error = readRecord(payload, 'error');
        if (error) {
          throw new ProviderError(this.provider, `${this.modelId} stream error: ${readString(error, 'message') ?? 'unknown error'}`);
        }

        const choice = readArray(payload, 'choices')[0];
        const text = readString(readRecord(choice, 'delta'), 'content');
        if (text) {
          yield { text, isFinal: false };
        }

        const usage = readUsage(payload);
        if (usage) {
          finalSent = true;
          yield { text: '', isFinal: true, usage };
        }
      }
    } catch (error) {
      throw this.#wrap(error, options);
    }

    if (!finalSent) {
      yield { text: '', isFinal: true };
    }
  }

  async complete(
    messages: PromptMessage[],
    system: string,
    maxTokens: number,
    options: ModelRequestOptions = {},
  ): Promise<string> {
    const payload = await this.#request(this.#buildBody(messages, system, maxTokens, false), options);
    return this.#readCompletionText(payload);
  }

  #buildBody(messages: PromptMessage[], system: string, maxTokens: number, stream: boolean): Record<string, unknown> {
    const wire: WireMessage[] = [];
    if (system) {
      if (this.#reasoning) {
        wire.push({ role: 'user', content: `[System Instructions]\n${system}\n[End System Instructions]` });
        wire.push({ role: 'assistant', content: "Understood. I'll follow these instructions." });
      } else {
        wire.push({ role: 'system', content: system });
      }
    }
    for (const message of messages) {
      wire.push({ role: message.role, content: message.content });
    }

    const body: Record<string, unknown> = { model: this.modelId, messages: wire };
    // OpenRouter still takes the older parameter name
    if (this.provider === 'openrouter') {
      body.max_tokens = maxTokens;
    } else {
      body.max_completion_tokens = maxTokens;
    }
    if (stream) {
      body.stream = true;
      body.stream_options = { include_usage: true };
    }
    return body;
  }

  #readCompletionText(payload: unknown): string {
    const choice = readArray(payload, 'choices')[0];
    const message = readRecord(choice, 'message');
    if (!message) {
      throw new ProviderError(this.provider, `${this.modelId} returned an empty choices payload.`, { retryable: false });
    }
    return readString(message, 'content') ?? '';
  }

  async #request(body: Record<string, unknown>, options: ModelRequestOptions): Promise<unknown> {
    const response = await this.#send(body, options);
    try {
      return await response.json();
    } catch (error) {
      throw this.#wrap(error, options);
    }
  }

  async #send(body: Record<string, unknown>, options: ModelRequestOptions): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(this.#endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.#apiKey}`,
          ...this.#extraHeaders,
        },
        body: JSON.stringify(body),
        signal: options.signal,
      });
    } catch (error) {
      throw this.#wrap(error, options);
    }

    if (!response.ok) {
      const errText = scrubSensitiveText(await response.text());
      throw new ProviderError(this.provider, `HTTP ${response.status} from ${this.modelId}: ${errText}`, {
        statusCode: response.status,
      });
    }
    return response;
  }

  /** Aborts pass through untouched so callers can tell an interrupt from a failure. */
  #wrap(error: unknown, options: ModelRequestOptions): unknown {
    if (error instanceof ProviderError || options.signal?.aborted) {
      return error;
    }
    const message = scrubSensitiveText(error instanceof Error ? error.message : String(error));
    return new ProviderError(this.provider, `Transport error on ${this.modelId}: ${message}`);
  }
}
