import type { AgentProfile, CredentialResolver } from '@crewroom/types';
import { requiresApiKey } from '@crewroom/providers';

/**
 * Key for an agent: its own variable first, then the provider's conventional one.
 * '' means not configured.
 */
export function resolveAgentApiKey(profile: AgentProfile, resolve: CredentialResolver): string {
  const direct = profile.apiKeyEnv ? resolve(profile.apiKeyEnv) : '';
  return direct || resolve(profile.provider);
}

export function hasUsableKey(profile: AgentProfile, apiKey: string): boolean {
  return apiKey !== '' || !requiresApiKey(profile.provider);
}
