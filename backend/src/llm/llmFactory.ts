import { LLMProvider, LLMProviderConfig, LLMProviderType } from './types';
import { OpenAILLMProvider } from './openaiProvider';
import { AnthropicLLMProvider } from './anthropicProvider';
import { Config, LLM_PROVIDER_TYPES } from '../config';

/**
 * Builds the provider config for a provider type from the loaded settings
 */
export function providerConfigFor(providerType: LLMProviderType, settings: Config): LLMProviderConfig {
  switch (providerType) {
    case 'openai':
      return {
        type: 'openai',
        apiKey: settings.openaiApiKey,
        model: settings.openaiModel,
        apiBase: settings.openaiApiBase,
        maxTokens: settings.llmMaxTokens,
        maxAttempts: settings.llmMaxAttempts,
      };

    case 'anthropic':
      return {
        type: 'anthropic',
        apiKey: settings.anthropicApiKey,
        model: settings.anthropicModel,
        maxTokens: settings.llmMaxTokens,
        maxAttempts: settings.llmMaxAttempts,
      };

    default:
      throw new Error(`Unknown LLM provider type: ${providerType as string}`);
  }
}

/**
 * Factory function to create LLM providers
 */
export function createLLMProvider(providerType: LLMProviderType, settings: Config): LLMProvider {
  return createLLMProviderFromConfig(providerConfigFor(providerType, settings));
}

/**
 * Creates an LLM provider from a custom config
 */
export function createLLMProviderFromConfig(providerConfig: LLMProviderConfig): LLMProvider {
  switch (providerConfig.type) {
    case 'openai':
      return new OpenAILLMProvider(providerConfig);
    case 'anthropic':
      return new AnthropicLLMProvider(providerConfig);
    default:
      throw new Error(`Unknown LLM provider type: ${providerConfig.type as string}`);
  }
}

export function isLLMProviderType(value: unknown): value is LLMProviderType {
  return LLM_PROVIDER_TYPES.some((type) => type === value);
}

/**
 * Tests all providers and returns availability
 */
export async function testAllProviders(
  providers: ReadonlyMap<LLMProviderType, LLMProvider>
): Promise<Map<LLMProviderType, boolean>> {
  const results = new Map<LLMProviderType, boolean>();

  for (const [providerType, provider] of providers) {
    try {
      results.set(providerType, await provider.testConnection());
    } catch {
      results.set(providerType, false);
    }
  }

  return results;
}
