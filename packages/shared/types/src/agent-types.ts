/**
 * Agent and conversation types shared by the orchestration packages.
 */

export type MessageRole = 'user' | 'assistant' | 'system';

/**
 * A single conversation message. Never mutated after creation.
 */
export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  /** Agent that produced (or was addressed by) this message */
  readonly agentTag?: string;
}

/**
 * Named agent configuration: model + provider + system prompt.
 */
export interface AgentProfile {
  readonly name: string;
  /** Provider id, e.g. 'openai', 'anthropic', 'ollama' */
  readonly provider: string;
  readonly model: string;
  readonly systemPrompt: string;
  readonly temperature: number;
  /** Context ceiling used when trimming history for this agent */
  readonly maxTokens: number;
  /** Environment variable holding this agent's API key */
  readonly apiKeyEnv: string;
  readonly baseUrl?: string;
}

/**
 * Lookup surface over the configured agents.
 */
export interface AgentDirectory {
  /** Resolve a profile; exact match first, then case-insensitive. Throws for unknown names. */
  getAgent(name: string): AgentProfile;
  /** Resolve a name to its configured spelling, or undefined */
  resolveName(name: string): string | undefined;
  getDefaultAgentName(): string;
  listAgents(): string[];
}

export interface TokenUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface CompletionResult {
  content: string;
  model?: string;
  usage?: TokenUsage;
}

/**
 * Per-call options accepted by a provider.
 */
export interface ProviderCallOptions {
  signal?: AbortSignal;
  /** Absolute deadline (epoch ms) after which the call is aborted */
  deadline?: number;
}

/**
 * The single capability every LLM backend is reduced to.
 *
 * `stream` is one-shot per call. Backends without streaming throw
 * `StreamingNotSupportedError` so callers can fall back to `complete`.
 */
export interface ProviderCapability {
  readonly providerId: string;
  complete(
    messages: readonly Message[],
    systemPrompt?: string,
    options?: ProviderCallOptions
  ): Promise<CompletionResult>;
  stream(
    messages: readonly Message[],
    systemPrompt?: string,
    options?: ProviderCallOptions
  ): AsyncIterable<string>;
}

/**
 * Settings a provider handle is built from.
 */
export interface ProviderSettings {
  model: string;
  temperature?: number;
  maxTokens?: number;
  baseUrl?: string;
}

/**
 * Builds a provider handle from a provider id, settings and API key.
 */
export type ProviderFactory = (
  providerId: string,
  settings: ProviderSettings,
  apiKey: string
) => ProviderCapability;

/**
 * Resolves an API key by environment variable or provider name.
 * An empty string means "not configured", not an error.
 */
export type CredentialResolver = (name: string) => string;
