import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';
import type { PromptMessage } from '../core/types.js';

/** Approximation used for models without a public tokenizer. */
export const CHARS_PER_TOKEN = 4;
export const MESSAGE_OVERHEAD_TOKENS = 4;
export const PROMPT_OVERHEAD_TOKENS = 10;

const encoderCache = new Map<TiktokenEncoding, Tiktoken>();

function encoderFor(encoding: TiktokenEncoding): Tiktoken {
  const cached = encoderCache.get(encoding);
  if (cached) {
    return cached;
  }
  const encoder = getEncoding(encoding);
  encoderCache.set(encoding, encoder);
  return encoder;
}

/** Picks a public tokenizer for OpenAI model families; null means approximate. */
export function resolveEncoding(modelId: string): TiktokenEncoding | null {
  const id = modelId.toLowerCase().replace(/^openai\//, '');
  if (/^gpt-(4o|4\.1|5)/.test(id) || /^o\d/.test(id)) {
    return 'o200k_base';
  }
  if (id.startsWith('gpt-')) {
    return 'cl100k_base';
  }
  return null;
}

/**
 * Model-aware token counting. OpenAI families are counted exactly; every other
 * model is approximate at one token per four characters.
 */
export class TokenCounter {
  readonly #modelId: string;
  readonly #encoding: TiktokenEncoding | null;

  constructor(modelId: string) {
    this.#modelId = modelId;
    this.#encoding = resolveEncoding(modelId);
  }

  get modelId(): string {
    return this.#modelId;
  }

  /** False when counts come from the character approximation. */
  get isExact(): boolean {
    return this.#encoding !== null;
  }

  count(text: string): number {
    if (!text) {
      return 0;
    }
    if (this.#encoding) {
      return encoderFor(this.#encoding).encode(text).length;
    }
    return Math.floor(text.length / CHARS_PER_TOKEN);
  }

  countMessages(messages: readonly PromptMessage[]): number {
    let total = 0;
    for (const message of messages) {
      total += this.count(message.content) + MESSAGE_OVERHEAD_TOKENS;
    }
    return total;
  }

  countPrompt(system: string, messages: readonly PromptMessage[]): number {
    return this.count(system) + this.countMessages(messages) + PROMPT_OVERHEAD_TOKENS;
  }
}
