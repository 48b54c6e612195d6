export { AnthropicProvider, toAnthropicMessages, type AnthropicProviderConfig } from './anthropic-provider.js';
export { OpenAICompatibleProvider, type OpenAICompatibleProviderConfig } from './openai-compatible-provider.js';
export {
  createProvider,
  detectProviderType,
  isProviderType,
  PROVIDER_TYPES,
  type ProviderConfig,
  type ProviderType,
} from './provider-factory.js';
