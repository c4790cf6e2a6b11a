import { describe, it, expect, vi } from 'vitest';

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: vi.fn() } };
  },
}));
vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: vi.fn() };
  },
}));
vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel = vi.fn();
  },
}));

import { CrewroomError, CrewroomErrorCodes } from '@crewroom/types';
import { createProviderFactory, requiresApiKey } from './registry.js';
import { OpenAIProvider } from './openai.js';
import { AnthropicProvider } from './anthropic.js';
import { OllamaProvider } from './ollama.js';
import { GeminiProvider } from './gemini.js';

describe('createProviderFactory', () => {
  const factory = createProviderFactory();

  it('builds providers by id, case-insensitively', () => {
    expect(factory('openai', { model: 'gpt-4o' }, 'test-key')).toBeInstanceOf(OpenAIProvider);
    expect(factory('Anthropic', { model: 'claude-3-5-sonnet' }, 'test-key')).toBeInstanceOf(
      AnthropicProvider
    );
    expect(factory('ollama', { model: 'llama3' }, '')).toBeInstanceOf(OllamaProvider);
    expect(factory('gemini', { model: 'gemini-1.5-pro' }, 'test-key')).toBeInstanceOf(GeminiProvider);
  });

  it('rejects providers without an adapter', () => {
    try {
      factory('bedrock', { model: 'titan' }, 'test-key');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CrewroomError);
      expect((error as CrewroomError).code).toBe(CrewroomErrorCodes.CONFIG);
      expect((error as CrewroomError).message).toBe(
        "Unsupported provider 'bedrock'. Supported: openai, anthropic, ollama, gemini"
      );
    }
  });
});

describe('requiresApiKey', () => {
  it('exempts local backends', () => {
    expect(requiresApiKey('Ollama')).toBe(false);
    expect(requiresApiKey('openai')).toBe(true);
  });
});
