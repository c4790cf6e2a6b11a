/**
 * Configuration Schema for Crewroom
 *
 * TypeScript types matching the crewroom.toml structure.
 */

/**
 * Core project settings
 */
export interface CrewroomSection {
  name: string;
  version: string;
}

export type ProviderId = 'openai' | 'anthropic' | 'ollama' | 'gemini';

/**
 * One named agent: `[agents.<Name>]`
 */
export interface AgentConfig {
  provider: string;
  model: string;
  /** Environment variable holding the API key */
  api_key_env: string;
  system_prompt: string;
  temperature?: number;
  max_tokens?: number;
  base_url?: string;
}

/**
 * Token bucket settings for one provider: `[rate_limits.<provider>]`
 */
export interface ProviderRateLimitConfig {
  /** Requests allowed per window */
  limit: number;
  /** Window length in seconds (default 60) */
  window?: number;
}

export interface RetryConfig {
  enabled?: boolean;
  max_retries?: number;
  backoff_multiplier?: number;
}

export interface ContextConfig {
  /** Messages after the system prompt that are never trimmed */
  preserve_first_n?: number;
}

export type DispatchPolicy = 'all' | 'first';

export interface RoutingConfig {
  dispatch?: DispatchPolicy;
}

/**
 * Built-in tool settings
 */
export interface ToolsConfig {
  shell_enabled?: boolean;
  /** Directories the filesystem tools may touch (default: working directory) */
  allowed_paths?: string[];
  /** Seconds before a shell command is killed */
  shell_timeout?: number;
}

export interface CriticConfig {
  enabled?: boolean;
  /** Agent that performs audits (default "Critic") */
  agent?: string;
}

export type ConfigLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface RuntimeConfig {
  log_level?: ConfigLogLevel;
}

/**
 * Complete Crewroom configuration
 */
export interface CrewroomConfig {
  crewroom: CrewroomSection;
  default_agent: string;
  agents: Record<string, AgentConfig>;
  rate_limits?: Record<string, ProviderRateLimitConfig>;
  retry?: RetryConfig;
  context?: ContextConfig;
  routing?: RoutingConfig;
  tools?: ToolsConfig;
  critic?: CriticConfig;
  runtime?: RuntimeConfig;
}

/**
 * Partial configuration for overlays (e.g., from environment variables)
 */
export type PartialCrewroomConfig = {
  [K in keyof CrewroomConfig]?: K extends 'crewroom' ? Partial<CrewroomConfig[K]> : CrewroomConfig[K];
};
