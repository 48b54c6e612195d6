/**
 * Provider Factory
 *
 * Creates the model client from explicit config, falling back to the
 * ACTLOOP_* environment variables.
 */

import type { LLMProvider } from '../llm-provider.js';
import { ConfigError } from '../errors.js';
import { AnthropicProvider } from './anthropic-provider.js';
import { OpenAICompatibleProvider } from './openai-compatible-provider.js';

export const PROVIDER_TYPES = ['anthropic', 'openai-compatible'] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

export interface ProviderConfig {
  type?: ProviderType;
  /** Anthropic API key (for type: 'anthropic') */
  anthropicApiKey?: string;
  /** Base URL for OpenAI-compatible endpoints */
  baseUrl?: string;
  /** API key for OpenAI-compatible endpoints */
  apiKey?: string;
  /** Default model name */
  model?: string;
  maxTokens?: number;
}

export function isProviderType(value: string): value is ProviderType {
  return PROVIDER_TYPES.some((type) => type === value);
}

/**
 * Create an LLM provider, auto-detecting from environment if no type given.
 *
 * Detection order:
 * 1. `ACTLOOP_LLM_PROVIDER` explicit → use that
 * 2. `ANTHROPIC_API_KEY` set → 'anthropic'
 * 3. Default → 'openai-compatible'
 */
export function createProvider(config?: ProviderConfig): LLMProvider {
  const type = config?.type ?? detectProviderType();

  switch (type) {
    case 'anthropic': {
      const apiKey = config?.anthropicApiKey ?? process.env.ANTHROPIC_API_KEY;
      if (!apiKey) {
        throw new ConfigError([
          'ANTHROPIC_API_KEY not set. Either set the environment variable or pass anthropicApiKey in config.',
        ]);
      }
      return new AnthropicProvider({ apiKey, model: config?.model, maxTokens: config?.maxTokens });
    }

    case 'openai-compatible':
      return new OpenAICompatibleProvider({
        baseUrl: config?.baseUrl ?? process.env.ACTLOOP_LLM_BASE_URL,
        apiKey: config?.apiKey ?? process.env.ACTLOOP_LLM_API_KEY,
        model: config?.model,
      });
  }
}

export function detectProviderType(): ProviderType {
  const explicit = process.env.ACTLOOP_LLM_PROVIDER;
  if (explicit) {
    if (!isProviderType(explicit)) {
      throw new ConfigError([`ACTLOOP_LLM_PROVIDER must be one of: ${PROVIDER_TYPES.join(', ')}`]);
    }
    return explicit;
  }

  if (process.env.ANTHROPIC_API_KEY) return 'anthropic';
  return 'openai-compatible';
}
