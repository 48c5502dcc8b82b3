import type { PromptMessage, ProviderId, StreamChunk } from '../core/types.js';

export interface ModelRequestOptions {
  signal?: AbortSignal;
}

/**
 * Uniform capability over every provider. Adapters are stateless: they keep no
 * history and do no retrieval. Failures surface as {@link ProviderError}.
 */
export interface ModelAdapter {
  readonly modelId: string;
  readonly provider: ProviderId;
  stream(
    messages: PromptMessage[],
    system: string,
    maxTokens: number,
    options?: ModelRequestOptions,
  ): AsyncIterable<StreamChunk>;
  complete(
    messages: PromptMessage[],
    system: string,
    maxTokens: number,
    options?: ModelRequestOptions,
  ): Promise<string>;
}

export class ProviderError extends Error {
  readonly provider: ProviderId;
  readonly statusCode: number | null;
  readonly retryable: boolean;

  constructor(provider: ProviderId, message: string, options: { statusCode?: number; retryable?: boolean } = {}) {
    super(message);
    this.name = 'ProviderError';
    this.provider = provider;
    this.statusCode = options.statusCode ?? null;
    this.retryable = options.retryable ?? (options.statusCode === undefined || options.statusCode === 429 || options.statusCode >= 500);
  }
}

export class ConfigurationError extends Error {
  readonly hints: string[];

  constructor(message: string, hints: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.hints = hints;
  }
}
