import OpenAI from 'openai';
import type {
  CompletionResult,
  Message,
  ProviderCallOptions,
  ProviderCapability,
  ProviderSettings,
} from '@crewroom/types';
import { mapProviderError, toRequestOptions } from './types.js';

function toOpenAiMessage(message: Message): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}

export function toOpenAiMessages(
  messages: readonly Message[],
  systemPrompt?: string
): OpenAI.ChatCompletionMessageParam[] {
  const formatted: OpenAI.ChatCompletionMessageParam[] = [];
  if (systemPrompt) {
    formatted.push({ role: 'system', content: systemPrompt });
  }
  for (const message of messages) {
    formatted.push(toOpenAiMessage(message));
  }
  return formatted;
}

/**
 * Chat completions against the OpenAI API, or any endpoint speaking it
 */
export class OpenAIProvider implements ProviderCapability {
  public readonly providerId: string;
  private readonly client: OpenAI;

  constructor(
    private readonly settings: ProviderSettings,
    apiKey: string,
    providerId = 'openai'
  ) {
    this.providerId = providerId;
    this.client = new OpenAI({ apiKey, baseURL: settings.baseUrl });
  }

  async complete(
    messages: readonly Message[],
    systemPrompt?: string,
    options?: ProviderCallOptions
  ): Promise<CompletionResult> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.settings.model,
          messages: toOpenAiMessages(messages, systemPrompt),
          temperature: this.settings.temperature,
          max_tokens: this.settings.maxTokens,
          stream: false,
        },
        toRequestOptions(options)
      );

      const choice = response.choices[0];
      return {
        content: choice?.message?.content ?? '',
        model: response.model ?? this.settings.model,
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      throw mapProviderError(error, 'OpenAI', options?.signal);
    }
  }

  async *stream(
    messages: readonly Message[],
    systemPrompt?: string,
    options?: ProviderCallOptions
  ): AsyncGenerator<string> {
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: this.settings.model,
          messages: toOpenAiMessages(messages, systemPrompt),
          temperature: this.settings.temperature,
          max_tokens: this.settings.maxTokens,
          stream: true,
        },
        toRequestOptions(options)
      );

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
    } catch (error) {
      throw mapProviderError(error, 'OpenAI', options?.signal);
    }
  }
}
