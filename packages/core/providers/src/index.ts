/**
 * @crewroom/providers - LLM backends behind the provider capability
 */

export {
  ProviderError,
  StreamingNotSupportedError,
  mapProviderError,
  toRequestOptions,
  type ProviderErrorKind,
} from './adapters/types.js';

export { OpenAIProvider, toOpenAiMessages } from './adapters/openai.js';
export { AnthropicProvider, toAnthropicMessages, extractSystemPrompt } from './adapters/anthropic.js';
export { OllamaProvider, DEFAULT_OLLAMA_BASE_URL } from './adapters/ollama.js';
export { GeminiProvider, toGeminiContents } from './adapters/gemini.js';

export {
  createProviderFactory,
  requiresApiKey,
  SUPPORTED_PROVIDER_IDS,
  type ProviderFactoryOptions,
} from './adapters/registry.js';

export {
  createEnvCredentialResolver,
  redactKey,
  filterKeysFromText,
  PROVIDER_KEY_ENV,
} from './credentials.js';
