import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import type { ProviderId } from '../core/types.js';
import type { ArtifactKind } from '../types/orchestration.js';
import { isRecord } from '../utils/json.js';
import { getConfigPath as getWorkspaceConfigPath, getWorkspaceSubdir } from './workspace.js';

export interface LodestarConfig {
    models: {
        defaultModel: string;
        anthropicApiKey: string;
        openaiApiKey: string;
        openRouterApiKey: string;
        anthropicBaseUrl: string;
        openaiBaseUrl: string;
        openRouterBaseUrl: string;
    };
    context: {
        warningThreshold: number;
        criticalThreshold: number;
        minActiveMessages: number;
    };
    drift: {
        windowSize: number;
        threshold: number;
    };
    intent: {
        decayRate: number;
    };
    summarization: {
        timeoutMs: number;
        maxOutputTokens: number;
        maxAttempts: number;
    };
    artifacts: {
        timeoutMs: number;
        maxOutputTokens: number;
        kinds: ArtifactKind[];
    };
    streaming: {
        maxTokens: number;
    };
    retrieval: {
        topK: number;
    };
    storage: {
        databasePath: string;
    };
}

export const DEFAULT_CONFIG: LodestarConfig = {
    models: {
        defaultModel: 'claude-sonnet-4-5-20250514',
        anthropicApiKey: '',
        openaiApiKey: '',
        openRouterApiKey: '',
        anthropicBaseUrl: 'https://api.anthropic.com/v1',
        openaiBaseUrl: 'https://api.openai.com/v1',
        openRouterBaseUrl: 'https://openrouter.ai/api/v1',
    },
    context: {
        warningThreshold: 0.6,
        criticalThreshold: 0.8,
        minActiveMessages: 4,
    },
    drift: {
        windowSize: 6,
        threshold: 0.25,
    },
    intent: {
        decayRate: 0.3,
    },
    summarization: {
        timeoutMs: 60_000,
        maxOutputTokens: 1000,
        maxAttempts: 2,
    },
    artifacts: {
        timeoutMs: 120_000,
        maxOutputTokens: 2000,
        kinds: ['outline', 'decisions', 'research'],
    },
    streaming: {
        maxTokens: 4096,
    },
    retrieval: {
        topK: 5,
    },
    storage: {
        databasePath: '',
    },
};

const ARTIFACT_KINDS: readonly ArtifactKind[] = ['outline', 'decisions', 'research'];

const CREDENTIAL_ENV: Record<ProviderId, string> = {
    anthropic: 'ANTHROPIC_API_KEY',
    openai: 'OPENAI_API_KEY',
    openrouter: 'OPENROUTER_API_KEY',
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.LODESTAR_CONFIG_PATH) {
        return path.resolve(process.env.LODESTAR_CONFIG_PATH);
    }
    return getWorkspaceConfigPath();
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

export async function readConfig(overridePath?: string): Promise<LodestarConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return mergeWithDefaults({});
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to read config file at ${targetPath}: ${message}`);
    }

    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${message}`);
    }
}

export async function writeConfig(config: LodestarConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        const serialized = JSON.stringify(config, null, 2);
        await fs.writeFile(tempPath, serialized, { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        await fs.rm(tempPath, { force: true });
        throw new Error(`Failed to save config to ${targetPath}: ${message}`);
    }
}

/** Environment first, then the JSON value. Empty means not configured. */
export function resolveApiKey(config: LodestarConfig, provider: ProviderId): string {
    const fromEnv = process.env[CREDENTIAL_ENV[provider]]?.trim();
    if (fromEnv) return fromEnv;
    switch (provider) {
        case 'anthropic': return config.models.anthropicApiKey.trim();
        case 'openai': return config.models.openaiApiKey.trim();
        case 'openrouter': return config.models.openRouterApiKey.trim();
    }
}

export function credentialEnvName(provider: ProviderId): string {
    return CREDENTIAL_ENV[provider];
}

export function resolveDatabasePath(config: LodestarConfig): string {
    const configured = config.storage.databasePath.trim();
    if (configured === ':memory:') return configured;
    return configured ? path.resolve(configured) : path.join(getWorkspaceSubdir('sessions'), 'sessions.db');
}

export function mergeWithDefaults(loaded: unknown): LodestarConfig {
    const root = isRecord(loaded) ? loaded : {};
    const d = DEFAULT_CONFIG;
    const models = section(root, 'models');
    const context = section(root, 'context');
    const drift = section(root, 'drift');
    const intent = section(root, 'intent');
    const summarization = section(root, 'summarization');
    const artifacts = section(root, 'artifacts');
    const streaming = section(root, 'streaming');
    const retrieval = section(root, 'retrieval');
    const storage = section(root, 'storage');

    return {
        models: {
            defaultModel: pickString(models, 'defaultModel', d.models.defaultModel),
            anthropicApiKey: pickString(models, 'anthropicApiKey', d.models.anthropicApiKey),
            openaiApiKey: pickString(models, 'openaiApiKey', d.models.openaiApiKey),
            openRouterApiKey: pickString(models, 'openRouterApiKey', d.models.openRouterApiKey),
            anthropicBaseUrl: pickString(models, 'anthropicBaseUrl', d.models.anthropicBaseUrl),
            openaiBaseUrl: pickString(models, 'openaiBaseUrl', d.models.openaiBaseUrl),
            openRouterBaseUrl: pickString(models, 'openRouterBaseUrl', d.models.openRouterBaseUrl),
        },
        context: {
            warningThreshold: pickNumber(context, 'warningThreshold', d.context.warningThreshold),
            criticalThreshold: pickNumber(context, 'criticalThreshold', d.context.criticalThreshold),
            minActiveMessages: pickNumber(context, 'minActiveMessages', d.context.minActiveMessages),
        },
        drift: {
            windowSize: pickNumber(drift, 'windowSize', d.drift.windowSize),
            threshold: pickNumber(drift, 'threshold', d.drift.threshold),
        },
        intent: {
            decayRate: pickNumber(intent, 'decayRate', d.intent.decayRate),
        },
        summarization: {
            timeoutMs: pickNumber(summarization, 'timeoutMs', d.summarization.timeoutMs),
            maxOutputTokens: pickNumber(summarization, 'maxOutputTokens', d.summarization.maxOutputTokens),
            maxAttempts: pickNumber(summarization, 'maxAttempts', d.summarization.maxAttempts),
        },
        artifacts: {
            timeoutMs: pickNumber(artifacts, 'timeoutMs', d.artifacts.timeoutMs),
            maxOutputTokens: pickNumber(artifacts, 'maxOutputTokens', d.artifacts.maxOutputTokens),
            kinds: Array.isArray(artifacts.kinds)
                ? artifacts.kinds.filter(isArtifactKind)
                : [...d.artifacts.kinds],
        },
        streaming: {
            maxTokens: pickNumber(streaming, 'maxTokens', d.streaming.maxTokens),
        },
        retrieval: {
            topK: pickNumber(retrieval, 'topK', d.retrieval.topK),
        },
        storage: {
            databasePath: pickString(storage, 'databasePath', d.storage.databasePath),
        },
    };
}

function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
    return value instanceof Error && 'code' in value;
}

function isArtifactKind(value: unknown): value is ArtifactKind {
    return ARTIFACT_KINDS.some((kind) => kind === value);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = root[key];
    return isRecord(value) ? value : {};
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : fallback;
}

function pickNumber(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}
