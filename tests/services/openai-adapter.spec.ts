import { afterEach, describe, expect, it, vi } from 'vitest';
import { getModel } from '../../src/config/models.js';
import { OpenAiCompatibleAdapter } from '../../src/services/openai-adapter.js';
import type { ModelSpec } from '../../src/core/types.js';
import { collect, jsonResponse, requestOf, sseResponse, stubFetch } from '../harness/http.js';

function model(id: string): ModelSpec {
  const spec = getModel(id);
  if (!spec) throw new Error(`catalog is missing ${id}`);
  return spec;
}

describe('OpenAiCompatibleAdapter', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('streams deltas and picks up the trailing usage chunk', async () => {
    const fetchMock = stubFetch(sseResponse([
      'data: {"choices":[{"delta":{"role":"assistant","content":"Hi"}}]}\n\n',
      'data: {"choices":[{"delta":{"content":" there"}}]}\n\n',
      'data: {"choices":[],"usage":{"prompt_tokens":9,"completion_tokens":2}}\n\n',
      'data: [DONE]\n\n',
    ]));
    const adapter = new OpenAiCompatibleAdapter({ model: model('gpt-4o'), apiKey: 'test-secret', baseUrl: 'https://openai.test/v1' });

    const chunks = await collect(adapter.stream([{ role: 'user', content: 'hello' }], 'Be brief.', 128));

    expect(chunks).toEqual([
      { text: 'Hi', isFinal: false },
      { text: ' there', isFinal: false },
      { text: '', isFinal: true, usage: { inputTokens: 9, outputTokens: 2 } },
    ]);
    const request = requestOf(fetchMock);
    expect(request.url).toBe('https://openai.test/v1/chat/completions');
    expect(request.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(request.body).toEqual({
      model: 'gpt-4o',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'hello' },
      ],
      max_completion_tokens: 128,
      stream: true,
      stream_options: { include_usage: true },
    });
  });

  it('still ends with a final chunk when no usage arrives', async () => {
    stubFetch(sseResponse(['data: {"choices":[{"delta":{"content":"ok"}}]}\n\ndata: [DONE]\n\n']));
    const adapter = new OpenAiCompatibleAdapter({ model: model('gpt-4o'), apiKey: 'test-secret', baseUrl: 'https://openai.test/v1' });

    const chunks = await collect(adapter.stream([{ role: 'user', content: 'hello' }], '', 128));
    expect(chunks).toEqual([{ text: 'ok', isFinal: false }, { text: '', isFinal: true }]);
  });

  it('folds the system prompt into the conversation for reasoning models', async () => {
    const fetchMock = stubFetch(jsonResponse({
      choices: [{ message: { content: 'Thought it through.' } }],
      usage: { prompt_tokens: 20, completion_tokens: 4 },
    }));
    const adapter = new OpenAiCompatibleAdapter({ model: model('o3-mini'), apiKey: 'test-secret', baseUrl: 'https://openai.test/v1' });

    const chunks = await collect(adapter.stream([{ role: 'user', content: 'why?' }], 'Be brief.', 64));

    expect(chunks).toEqual([
      { text: 'Thought it through.', isFinal: false },
      { text: '', isFinal: true, usage: { inputTokens: 20, outputTokens: 4 } },
    ]);
    expect(requestOf(fetchMock).body).toEqual({
      model: 'o3-mini',
      messages: [
        { role: 'user', content: '[System Instructions]\nBe brief.\n[End System Instructions]' },
        { role: 'assistant', content: "Understood. I'll follow these instructions." },
        { role: 'user', content: 'why?' },
      ],
      max_completion_tokens: 64,
    });
  });

  it('sends attribution headers to OpenRouter', async () => {
    const fetchMock = stubFetch(jsonResponse({ choices: [{ message: { content: 'hi' } }] }));
    const adapter = new OpenAiCompatibleAdapter({
      model: model('google/gemini-2.5-pro'),
      apiKey: 'test-secret',
      baseUrl: 'https://openrouter.test/api/v1',
    });

    await expect(adapter.complete([{ role: 'user', content: 'hello' }], '', 32)).resolves.toBe('hi');
    const headers = requestOf(fetchMock).headers;
    expect(headers).toMatchObject({ 'X-Title': 'Lodestar' });
    expect(headers).not.toHaveProperty('HTTP-Referer');
  });

  it('sends max_tokens to OpenRouter', async () => {
    const fetchMock = stubFetch(jsonResponse({ choices: [{ message: { content: 'hi' } }] }));
    const adapter = new OpenAiCompatibleAdapter({
      model: model('deepseek/deepseek-v3.2'),
      apiKey: 'test-secret',
      baseUrl: 'https://openrouter.test/api/v1',
    });

    await adapter.complete([{ role: 'user', content: 'hello' }], '', 32);

    expect(requestOf(fetchMock).body).toEqual({
      model: 'deepseek/deepseek-v3.2',
      messages: [{ role: 'user', content: 'hello' }],
      max_tokens: 32,
    });
  });

  it('redacts credentials echoed in error bodies', async () => {
    stubFetch(new Response('invalid key sk-test1234567890abcdef', { status: 401 }));
    const adapter = new OpenAiCompatibleAdapter({ model: model('gpt-4o'), apiKey: 'test-secret', baseUrl: 'https://openai.test/v1' });

    await expect(adapter.complete([{ role: 'user', content: 'hello' }], '', 32))
      .rejects.toMatchObject({ message: 'HTTP 401 from gpt-4o: invalid key [REDACTED]', statusCode: 401, retryable: false });
  });
});
