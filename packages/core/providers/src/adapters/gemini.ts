import { GoogleGenerativeAI, type Content, type GenerativeModel } from '@google/generative-ai';
import type {
  CompletionResult,
  Message,
  ProviderCallOptions,
  ProviderCapability,
  ProviderSettings,
} from '@crewroom/types';
import { extractSystemPrompt } from './anthropic.js';
import { mapProviderError, toRequestOptions } from './types.js';

/**
 * Gemini calls the assistant role `model`; system text goes to systemInstruction
 */
export function toGeminiContents(messages: readonly Message[]): Content[] {
  return messages
    .filter((message) => message.role !== 'system')
    .map((message): Content => ({
      role: message.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: message.content }],
    }));
}

export class GeminiProvider implements ProviderCapability {
  public readonly providerId = 'gemini';
  private readonly client: GoogleGenerativeAI;

  constructor(
    private readonly settings: ProviderSettings,
    apiKey: string
  ) {
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async complete(
    messages: readonly Message[],
    systemPrompt?: string,
    options?: ProviderCallOptions
  ): Promise<CompletionResult> {
    try {
      const result = await this.getModel(messages, systemPrompt).generateContent(
        { contents: toGeminiContents(messages) },
        toRequestOptions(options)
      );
      const { response } = result;
      const usage = response.usageMetadata;

      return {
        content: response.text(),
        model: this.settings.model,
        ...(usage
          ? {
              usage: {
                promptTokens: usage.promptTokenCount,
                completionTokens: usage.candidatesTokenCount,
                totalTokens: usage.totalTokenCount,
              },
            }
          : {}),
      };
    } catch (error) {
      throw mapProviderError(error, 'Gemini', options?.signal);
    }
  }

  async *stream(
    messages: readonly Message[],
    systemPrompt?: string,
    options?: ProviderCallOptions
  ): AsyncGenerator<string> {
    try {
      const result = await this.getModel(messages, systemPrompt).generateContentStream(
        { contents: toGeminiContents(messages) },
        toRequestOptions(options)
      );

      for await (const chunk of result.stream) {
        const text = chunk.text();
        if (text) {
          yield text;
        }
      }
    } catch (error) {
      throw mapProviderError(error, 'Gemini', options?.signal);
    }
  }

  private getModel(messages: readonly Message[], systemPrompt?: string): GenerativeModel {
    const systemInstruction = extractSystemPrompt(messages, systemPrompt);
    return this.client.getGenerativeModel(
      {
        model: this.settings.model,
        ...(systemInstruction ? { systemInstruction } : {}),
        generationConfig: {
          temperature: this.settings.temperature,
          maxOutputTokens: this.settings.maxTokens,
        },
      },
      this.settings.baseUrl ? { baseUrl: this.settings.baseUrl } : undefined
    );
  }
}
