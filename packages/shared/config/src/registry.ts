/**
 * Agent registry over the configured `[agents.*]` tables
 */

import {
  createUnknownAgentError,
  validateAgentName,
  validateAgentProfile,
  type AgentDirectory,
  type AgentProfile,
} from '@crewroom/types';
import type { AgentConfig, CrewroomConfig } from './schema.js';

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 4096;

export function toAgentProfile(name: string, agent: AgentConfig): AgentProfile {
  return Object.freeze({
    name,
    provider: agent.provider,
    model: agent.model,
    systemPrompt: agent.system_prompt,
    temperature: agent.temperature ?? DEFAULT_TEMPERATURE,
    maxTokens: agent.max_tokens ?? DEFAULT_MAX_TOKENS,
    apiKeyEnv: agent.api_key_env ?? '',
    ...(agent.base_url ? { baseUrl: agent.base_url } : {}),
  });
}

/**
 * Immutable lookup of agent profiles by name.
 * Exact matches win; otherwise names compare case-insensitively.
 * Construction throws a validation error for a bad name or profile.
 */
export class AgentRegistry implements AgentDirectory {
  private readonly profiles = new Map<string, AgentProfile>();
  private readonly defaultAgent: string;

  constructor(agents: Record<string, AgentConfig>, defaultAgent: string) {
    for (const [name, agent] of Object.entries(agents)) {
      validateAgentName(name, 'config');
      const profile = toAgentProfile(name, agent);
      validateAgentProfile(profile);
      this.profiles.set(name, profile);
    }
    this.defaultAgent = this.resolveName(defaultAgent) ?? defaultAgent;
  }

  static fromConfig(config: CrewroomConfig): AgentRegistry {
    return new AgentRegistry(config.agents, config.default_agent);
  }

  resolveName(name: string): string | undefined {
    if (this.profiles.has(name)) return name;
    const lower = name.toLowerCase();
    for (const configured of this.profiles.keys()) {
      if (configured.toLowerCase() === lower) return configured;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.resolveName(name) !== undefined;
  }

  getAgent(name: string): AgentProfile {
    const resolved = this.resolveName(name);
    const profile = resolved === undefined ? undefined : this.profiles.get(resolved);
    if (!profile) {
      throw createUnknownAgentError(name, { component: 'config' });
    }
    return profile;
  }

  getDefaultAgentName(): string {
    return this.defaultAgent;
  }

  getDefaultAgent(): AgentProfile {
    return this.getAgent(this.defaultAgent);
  }

  listAgents(): string[] {
    return [...this.profiles.keys()];
  }
}
