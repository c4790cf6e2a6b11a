import { createConfigError, type ProviderFactory } from '@crewroom/types';
import type { Logger } from '@crewroom/utils';
import { AnthropicProvider } from './anthropic.js';
import { GeminiProvider } from './gemini.js';
import { OpenAIProvider } from './openai.js';
import { OllamaProvider } from './ollama.js';

export const SUPPORTED_PROVIDER_IDS = ['openai', 'anthropic', 'ollama', 'gemini'] as const;

/** Local backends accept requests without a key */
const KEYLESS_PROVIDERS: ReadonlySet<string> = new Set(['ollama']);

export function requiresApiKey(providerId: string): boolean {
  return !KEYLESS_PROVIDERS.has(providerId.toLowerCase());
}

export interface ProviderFactoryOptions {
  logger?: Logger;
}

/**
 * Build provider handles by provider id. Unknown ids are configuration errors.
 */
export function createProviderFactory(options: ProviderFactoryOptions = {}): ProviderFactory {
  const { logger } = options;

  return (providerId, settings, apiKey) => {
    const id = providerId.toLowerCase();
    logger?.debug(`Creating ${id} provider for model ${settings.model}`);

    switch (id) {
      case 'openai':
        return new OpenAIProvider(settings, apiKey);
      case 'anthropic':
        return new AnthropicProvider(settings, apiKey);
      case 'ollama':
        return new OllamaProvider(settings, apiKey);
      case 'gemini':
        return new GeminiProvider(settings, apiKey);
      default:
        throw createConfigError(
          `Unsupported provider '${providerId}'. Supported: ${SUPPORTED_PROVIDER_IDS.join(', ')}`,
          { component: 'providers', details: { providerId } }
        );
    }
  };
}
