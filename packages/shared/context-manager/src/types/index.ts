/**
 * Context management types
 */

export interface TrimOptions {
  /** Prepended as a system message; existing system messages are then dropped */
  systemPrompt?: string;
  /** Token ceiling for the returned list */
  maxTokens: number;
  /** Messages after the system prompt that are never trimmed */
  preserveFirstN?: number;
}

export interface ContextTokenUsage {
  totalTokens: number;
  maxTokens: number;
  usagePercent: number;
}
