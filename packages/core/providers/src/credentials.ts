/**
 * API key lookup from the environment, plus redaction for logs
 */

import type { CredentialResolver } from '@crewroom/types';

/** Conventional variable per provider id */
export const PROVIDER_KEY_ENV: Readonly<Record<string, string>> = {
  gemini: 'GOOGLE_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

/**
 * Resolve by variable name first, then by provider id.
 * Returns '' when nothing is configured.
 */
export function createEnvCredentialResolver(env: NodeJS.ProcessEnv = process.env): CredentialResolver {
  return (name: string) => {
    const direct = env[name];
    if (direct) return direct;

    const conventional = PROVIDER_KEY_ENV[name.toLowerCase()];
    return (conventional && env[conventional]) || '';
  };
}

const KEY_PATTERN = /^(sk-[a-zA-Z0-9]{8})[a-zA-Z0-9-]+(\w{3})$/;

/**
 * Show only enough of a key to tell keys apart
 */
export function redactKey(apiKey: string): string {
  if (!apiKey) return '[EMPTY]';
  if (apiKey.length <= 11) return '***';

  const match = KEY_PATTERN.exec(apiKey);
  if (match) {
    return `${match[1]}...${match[2]}`;
  }
  return `${apiKey.slice(0, 8)}...${apiKey.slice(-3)}`;
}

/**
 * Replace every occurrence of the given keys with their redacted form
 */
export function filterKeysFromText(text: string, keys: readonly string[]): string {
  let filtered = text;
  for (const key of keys) {
    if (key) {
      filtered = filtered.split(key).join(redactKey(key));
    }
  }
  return filtered;
}
