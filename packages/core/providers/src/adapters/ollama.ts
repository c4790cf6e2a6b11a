import type {
  CompletionResult,
  Message,
  ProviderCallOptions,
  ProviderCapability,
  ProviderSettings,
} from '@crewroom/types';
import { OpenAIProvider } from './openai.js';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

/**
 * Local models through Ollama's OpenAI-compatible endpoint
 */
export class OllamaProvider implements ProviderCapability {
  public readonly providerId = 'ollama';
  private readonly delegate: OpenAIProvider;

  constructor(settings: ProviderSettings, apiKey = '') {
    this.delegate = new OpenAIProvider(
      { ...settings, baseUrl: settings.baseUrl ?? DEFAULT_OLLAMA_BASE_URL },
      apiKey || 'ollama',
      this.providerId
    );
  }

  complete(
    messages: readonly Message[],
    systemPrompt?: string,
    options?: ProviderCallOptions
  ): Promise<CompletionResult> {
    return this.delegate.complete(messages, systemPrompt, options);
  }

  stream(
    messages: readonly Message[],
    systemPrompt?: string,
    options?: ProviderCallOptions
  ): AsyncGenerator<string> {
    return this.delegate.stream(messages, systemPrompt, options);
  }
}
