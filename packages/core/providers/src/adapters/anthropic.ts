import Anthropic from '@anthropic-ai/sdk';
import type { MessageParam } from '@anthropic-ai/sdk/resources/messages';
import type {
  CompletionResult,
  Message,
  ProviderCallOptions,
  ProviderCapability,
  ProviderSettings,
} from '@crewroom/types';
import { mapProviderError, toRequestOptions } from './types.js';

const DEFAULT_MAX_TOKENS = 4096;

/**
 * Anthropic takes the system prompt separately from the turns
 */
export function extractSystemPrompt(
  messages: readonly Message[],
  systemPrompt?: string
): string | undefined {
  const parts = [
    systemPrompt ?? '',
    ...messages.filter((message) => message.role === 'system').map((message) => message.content),
  ].filter(Boolean);
  return parts.length > 0 ? parts.join('\n\n') : undefined;
}

export function toAnthropicMessages(messages: readonly Message[]): MessageParam[] {
  return messages
    .filter((message) => message.role !== 'system')
    .map((message): MessageParam => ({
      role: message.role === 'assistant' ? 'assistant' : 'user',
      content: message.content,
    }));
}

export class AnthropicProvider implements ProviderCapability {
  public readonly providerId = 'anthropic';
  private readonly client: Anthropic;

  constructor(
    private readonly settings: ProviderSettings,
    apiKey: string
  ) {
    this.client = new Anthropic({ apiKey, baseURL: settings.baseUrl });
  }

  async complete(
    messages: readonly Message[],
    systemPrompt?: string,
    options?: ProviderCallOptions
  ): Promise<CompletionResult> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.settings.model,
          system: extractSystemPrompt(messages, systemPrompt),
          messages: toAnthropicMessages(messages),
          max_tokens: this.settings.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: this.settings.temperature,
        },
        toRequestOptions(options)
      );

      let content = '';
      for (const block of response.content) {
        if (block.type === 'text') {
          content += block.text;
        }
      }

      return {
        content,
        model: response.model ?? this.settings.model,
        usage: {
          promptTokens: response.usage.input_tokens,
          completionTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens,
        },
      };
    } catch (error) {
      throw mapProviderError(error, 'Anthropic', options?.signal);
    }
  }

  async *stream(
    messages: readonly Message[],
    systemPrompt?: string,
    options?: ProviderCallOptions
  ): AsyncGenerator<string> {
    try {
      const stream = await this.client.messages.create(
        {
          model: this.settings.model,
          system: extractSystemPrompt(messages, systemPrompt),
          messages: toAnthropicMessages(messages),
          max_tokens: this.settings.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: this.settings.temperature,
          stream: true,
        },
        toRequestOptions(options)
      );

      for await (const event of stream) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield event.delta.text;
        }
      }
    } catch (error) {
      throw mapProviderError(error, 'Anthropic', options?.signal);
    }
  }
}
