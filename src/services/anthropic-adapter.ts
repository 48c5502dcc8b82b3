import type { ModelSpec, PromptMessage, StreamChunk } from '../core/types.js';
import { ProviderError, type ModelAdapter, type ModelRequestOptions } from '../types/model-adapter.js';
import { readArray, readNumber, readRecord, readString, tryParseJson } from '../utils/json.js';
import { scrubSensitiveText } from '../utils/logger.js';
import { readSseEvents } from '../utils/sse.js';

export const ANTHROPIC_API_VERSION = '2023-06-01';

export interface AnthropicAdapterOptions {
  model: ModelSpec;
  apiKey: string;
  baseUrl: string;
}

/**
 * The messages API wants strictly alternating roles starting with `user`.
 * Context notes arrive as consecutive user messages, so same-role runs are
 * joined and a leading assistant message is re-labelled.
 */
export function normalizeAnthropicMessages(messages: readonly PromptMessage[]): PromptMessage[] {
  const normalized: PromptMessage[] = [];
  messages.forEach((message, position) => {
    const role = position === 0 ? 'user' : message.role;
    const previous = normalized[normalized.length - 1];
    if (previous && previous.role === role) {
      previous.content = `${previous.content}\n\n${message.content}`;
    } else {
      normalized.push({ role, content: message.content });
    }
  });
  return normalized;
}

export class AnthropicAdapter implements ModelAdapter {
  readonly modelId: string;
  readonly provider = 'anthropic' as const;
  readonly #apiKey: string;
  readonly #endpoint: string;

  constructor(options: AnthropicAdapterOptions) {
    if (options.model.provider !== 'anthropic') {
      throw new ProviderError(options.model.provider, `Model ${options.model.id} is not an Anthropic model.`, { retryable: false });
    }
    this.modelId = options.model.id;
    this.#apiKey = options.apiKey;
    this.#endpoint = `${options.baseUrl.replace(/\/+$/, '')}/messages`;
  }

  async *stream(
    messages: PromptMessage[],
    system: string,
    maxTokens: number,
    options: ModelRequestOptions = {},
  ): AsyncIterable<StreamChunk> {
    const response = await this.#send(this.#buildBody(messages, system, maxTokens, true), options);
    if (!response.body) {
      throw new ProviderError(this.provider, `${this.modelId} returned an empty stream body.`);
    }

    let inputTokens = 0;
    let outputTokens = 0;
    try {
      for await (const event of readSseEvents(response.body)) {
        const payload = tryParseJson(event.data);
        const type = readString(payload, 'type') ?? event.event;

        switch (type) {
          case 'message_start': {
            inputTokens = readNumber(readRecord(readRecord(payload, 'message'), 'usage'), 'input_tokens') ?? inputTokens;
            break;
          }
          case 'content_block_delta': {
            const text = readString(readRecord(payload, 'delta'), 'text');
            if (text) {
              yield { text, isFinal: false };
            }
            break;
          }
          case 'message_delta': {
            outputTokens = readNumber(readRecord(payload, 'usage'), 'output_tokens') ?? outputTokens;
            break;
          }
          case 'error': {
            const message = readString(readRecord(payload, 'error'), 'message') ?? 'unknown error';
            throw new ProviderError(this.provider, `${this.modelId} stream error: ${message}`);
          }
          default:
            break;
        }
      }
    } catch (error) {
      throw this.#wrap(error, options);
    }

    yield { text: '', isFinal: true, usage: { inputTokens, outputTokens } };
  }

  async complete(
    messages: PromptMessage[],
    system: string,
    maxTokens: number,
    options: ModelRequestOptions = {},
  ): Promise<string> {
    const response = await this.#send(this.#buildBody(messages, system, maxTokens, false), options);
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw this.#wrap(error, options);
    }

    const parts: string[] = [];
    for (const block of readArray(payload, 'content')) {
      if (readString(block, 'type') === 'text') {
        parts.push(readString(block, 'text') ?? '');
      }
    }
    return parts.join('');
  }

  #buildBody(messages: PromptMessage[], system: string, maxTokens: number, stream: boolean): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.modelId,
      max_tokens: maxTokens,
      messages: normalizeAnthropicMessages(messages),
    };
    if (system) body.system = system;
    if (stream) body.stream = true;
    return body;
  }

  async #send(body: Record<string, unknown>, options: ModelRequestOptions): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(this.#endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.#apiKey,
          'anthropic-version': ANTHROPIC_API_VERSION,
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

  #wrap(error: unknown, options: ModelRequestOptions): unknown {
    if (error instanceof ProviderError || options.signal?.aborted) {
      return error;
    }
    const message = scrubSensitiveText(error instanceof Error ? error.message : String(error));
    return new ProviderError(this.provider, `Transport error on ${this.modelId}: ${message}`);
  }
}
