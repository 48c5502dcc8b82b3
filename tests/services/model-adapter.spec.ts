import { afterEach, describe, expect, it, vi } from 'vitest';
import { mergeWithDefaults } from '../../src/config/json-config.js';
import { AnthropicAdapter } from '../../src/services/anthropic-adapter.js';
import { createModelAdapter } from '../../src/services/model-adapter.js';
import { OpenAiCompatibleAdapter } from '../../src/services/openai-adapter.js';
import { ConfigurationError } from '../../src/types/model-adapter.js';

describe('createModelAdapter', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('picks the adapter by provider', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    vi.stubEnv('OPENROUTER_API_KEY', 'test-secret');
    const config = mergeWithDefaults({});

    const claude = createModelAdapter('claude-sonnet-4-5-20250514', config);
    expect(claude.adapter).toBeInstanceOf(AnthropicAdapter);
    expect(claude.model.contextWindow).toBe(200_000);

    const gemini = createModelAdapter('google/gemini-2.5-pro', config);
    expect(gemini.adapter).toBeInstanceOf(OpenAiCompatibleAdapter);
    expect(gemini.adapter.provider).toBe('openrouter');
  });

  it('rejects unknown models', () => {
    expect(() => createModelAdapter('no-such-model', mergeWithDefaults({}))).toThrow(ConfigurationError);
  });

  it('names the missing credential in its hint', () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    try {
      createModelAdapter('gpt-4o', mergeWithDefaults({}));
      expect.unreachable('expected a configuration error');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        message: 'No API key configured for provider "openai".',
        hints: ['Set OPENAI_API_KEY in the environment or add it to lodestar.json under "models".'],
      });
    }
  });
});
