import { describe, expect, it } from 'vitest';
import { resolveEncoding, TokenCounter } from '../../src/services/token-counter.js';

describe('resolveEncoding', () => {
  it('maps OpenAI families to their public tokenizers', () => {
    expect(resolveEncoding('gpt-4o')).toBe('o200k_base');
    expect(resolveEncoding('openai/gpt-4o')).toBe('o200k_base');
    expect(resolveEncoding('o3-mini')).toBe('o200k_base');
    expect(resolveEncoding('gpt-3.5-turbo')).toBe('cl100k_base');
  });

  it('falls back to approximation for everything else', () => {
    expect(resolveEncoding('claude-sonnet-4-5-20250514')).toBeNull();
    expect(resolveEncoding('google/gemini-2.5-pro')).toBeNull();
  });
});

describe('TokenCounter', () => {
  it('approximates at four characters per token, rounding down', () => {
    const counter = new TokenCounter('claude-sonnet-4-5-20250514');
    expect(counter.isExact).toBe(false);
    expect(counter.count('')).toBe(0);
    expect(counter.count('abc')).toBe(0);
    expect(counter.count('abcdefghi')).toBe(2);
  });

  it('adds per-message and per-prompt overhead', () => {
    const counter = new TokenCounter('claude-sonnet-4-5-20250514');
    const messages = [
      { role: 'user' as const, content: 'abcd' },
      { role: 'assistant' as const, content: 'abcdefgh' },
    ];
    expect(counter.countMessages(messages)).toBe(1 + 4 + 2 + 4);
    expect(counter.countPrompt('abcdefgh', messages)).toBe(2 + 11 + 10);
  });

  it('never decreases as text grows', () => {
    const counter = new TokenCounter('claude-sonnet-4-5-20250514');
    let previous = 0;
    for (let length = 0; length < 64; length += 1) {
      const current = counter.count('x'.repeat(length));
      expect(current).toBeGreaterThanOrEqual(previous);
      previous = current;
    }
  });

  it('counts exactly for OpenAI models', () => {
    const counter = new TokenCounter('gpt-4o');
    expect(counter.isExact).toBe(true);
    expect(counter.count('hello')).toBe(1);
    expect(counter.count('hello world, hello again')).toBeGreaterThan(counter.count('hello world'));
  });
});
