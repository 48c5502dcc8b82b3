export type ChatRole = 'user' | 'assistant';

/** One entry in the authoritative turn log. */
export interface ChatMessage {
    role: ChatRole;
    content: string;
}

/** The `{ role, content }` payload handed to a model adapter. */
export interface PromptMessage {
    role: ChatRole;
    content: string;
}

export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
}

export interface StreamChunk {
    text: string;
    isFinal: boolean;
    usage?: TokenUsage;
}

export type ProviderId = 'anthropic' | 'openai' | 'openrouter';

export interface ModelSpec {
    id: string;
    displayName: string;
    provider: ProviderId;
    contextWindow: number;
    maxOutputTokens: number;
}
