import type { ModelSpec, ProviderId } from '../core/types.js';

const MODEL_CATALOG: readonly ModelSpec[] = [
    { id: 'claude-opus-4-5-20250514', displayName: 'Claude Opus 4.5', provider: 'anthropic', contextWindow: 200_000, maxOutputTokens: 32_768 },
    { id: 'claude-sonnet-4-5-20250514', displayName: 'Claude Sonnet 4.5', provider: 'anthropic', contextWindow: 200_000, maxOutputTokens: 16_384 },
    { id: 'gpt-4o', displayName: 'GPT-4o', provider: 'openai', contextWindow: 128_000, maxOutputTokens: 16_384 },
    { id: 'o1', displayName: 'o1', provider: 'openai', contextWindow: 200_000, maxOutputTokens: 100_000 },
    { id: 'o3-mini', displayName: 'o3-mini', provider: 'openai', contextWindow: 200_000, maxOutputTokens: 100_000 },
    { id: 'gpt-5', displayName: 'GPT-5', provider: 'openai', contextWindow: 200_000, maxOutputTokens: 32_768 },
    { id: 'google/gemini-2.5-flash', displayName: 'Gemini 2.5 Flash', provider: 'openrouter', contextWindow: 1_000_000, maxOutputTokens: 8_192 },
    { id: 'google/gemini-2.5-pro', displayName: 'Gemini 2.5 Pro', provider: 'openrouter', contextWindow: 1_000_000, maxOutputTokens: 8_192 },
    { id: 'deepseek/deepseek-v3.2', displayName: 'DeepSeek V3.2', provider: 'openrouter', contextWindow: 128_000, maxOutputTokens: 8_192 },
];

export function getModel(modelId: string): ModelSpec | null {
    return MODEL_CATALOG.find((model) => model.id === modelId) ?? null;
}

export function listModels(provider?: ProviderId): ModelSpec[] {
    return MODEL_CATALOG.filter((model) => provider === undefined || model.provider === provider);
}

/** OpenAI reasoning models take no system role and do not stream. */
export function isReasoningModel(modelId: string): boolean {
    return /^o\d/.test(modelId);
}
