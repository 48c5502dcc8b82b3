import type { ModelSpec } from '../core/types.js';
import { credentialEnvName, resolveApiKey, type LodestarConfig } from '../config/json-config.js';
import { getModel } from '../config/models.js';
import { ConfigurationError, type ModelAdapter } from '../types/model-adapter.js';
import { AnthropicAdapter } from './anthropic-adapter.js';
import { OpenAiCompatibleAdapter } from './openai-adapter.js';

export interface ResolvedAdapter {
  adapter: ModelAdapter;
  model: ModelSpec;
}

/**
 * Picks the adapter for a catalog model by its provider. Unknown models and
 * missing credentials fail here, before any turn starts.
 */
export function createModelAdapter(modelId: string, config: LodestarConfig): ResolvedAdapter {
  const model = getModel(modelId);
  if (!model) {
    throw new ConfigurationError(`Unknown model "${modelId}".`, ['Pick a model id from the catalog in src/config/models.ts.']);
  }

  const apiKey = resolveApiKey(config, model.provider);
  if (!apiKey) {
    const envName = credentialEnvName(model.provider);
    throw new ConfigurationError(`No API key configured for provider "${model.provider}".`, [
      `Set ${envName} in the environment or add it to lodestar.json under "models".`,
    ]);
  }

  switch (model.provider) {
    case 'anthropic':
      return { model, adapter: new AnthropicAdapter({ model, apiKey, baseUrl: config.models.anthropicBaseUrl }) };
    case 'openai':
      return { model, adapter: new OpenAiCompatibleAdapter({ model, apiKey, baseUrl: config.models.openaiBaseUrl }) };
    case 'openrouter':
      return { model, adapter: new OpenAiCompatibleAdapter({ model, apiKey, baseUrl: config.models.openRouterBaseUrl }) };
  }
}
