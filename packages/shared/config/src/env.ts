/**
 * Environment Variable Overlay
 *
 * Allows environment variables to override TOML configuration values
 */

import type { CrewroomConfig, PartialCrewroomConfig } from './schema.js';

/**
 * Mapping of environment variables to configuration paths
 */
const ENV_VAR_MAPPINGS: Record<string, string> = {
  CREWROOM_NAME: 'crewroom.name',
  CREWROOM_VERSION: 'crewroom.version',
  CREWROOM_DEFAULT_AGENT: 'default_agent',

  CREWROOM_RETRY_ENABLED: 'retry.enabled',
  CREWROOM_MAX_RETRIES: 'retry.max_retries',
  CREWROOM_BACKOFF_MULTIPLIER: 'retry.backoff_multiplier',

  CREWROOM_PRESERVE_FIRST_N: 'context.preserve_first_n',
  CREWROOM_DISPATCH: 'routing.dispatch',

  CREWROOM_SHELL_ENABLED: 'tools.shell_enabled',
  CREWROOM_SHELL_TIMEOUT: 'tools.shell_timeout',
  CREWROOM_ALLOWED_PATHS: 'tools.allowed_paths',

  CREWROOM_CRITIC_ENABLED: 'critic.enabled',
  CREWROOM_CRITIC_AGENT: 'critic.agent',

  CREWROOM_LOG_LEVEL: 'runtime.log_level',
};

const NUMERIC_KEYS = ['max_retries', 'backoff_multiplier', 'preserve_first_n', 'shell_timeout'];
const LIST_KEYS = ['allowed_paths'];

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string, path: string): string | number | boolean | string[] {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  if (NUMERIC_KEYS.some((key) => path.endsWith(key))) {
    const num = Number(value);
    if (!isNaN(num)) return num;
  }

  // Comma-separated lists
  if (LIST_KEYS.some((key) => path.endsWith(key))) {
    return value
      .split(',')
      .map((v) => v.trim())
      .filter(Boolean);
  }

  return value;
}

/**
 * Check if a key is safe to use (not a prototype pollution vector)
 */
function isSafeKey(key: string): boolean {
  return key !== '__proto__' && key !== 'constructor' && key !== 'prototype';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a nested property in an object using dot notation
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    if (!part || !isSafeKey(part)) continue;
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  const lastPart = parts[parts.length - 1];
  if (lastPart && isSafeKey(lastPart)) {
    current[lastPart] = value;
  }
}

function buildOverlay(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overlay: Record<string, unknown> = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(overlay, configPath, parseEnvValue(value, configPath));
    }
  }

  return overlay;
}

/**
 * Create configuration overlay from environment variables
 */
export function createEnvOverlay(env: NodeJS.ProcessEnv = process.env): PartialCrewroomConfig {
  return buildOverlay(env) as PartialCrewroomConfig;
}

/**
 * Deep merge two objects, with source taking precedence
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    if (!isSafeKey(key)) {
      continue;
    }

    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) continue;

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Apply environment variable overlay to configuration
 */
export function applyEnvOverlay(
  config: CrewroomConfig,
  env: NodeJS.ProcessEnv = process.env
): CrewroomConfig {
  const base: Record<string, unknown> = Object.fromEntries(Object.entries(config));
  const merged = deepMerge(base, buildOverlay(env));
  return merged as unknown as CrewroomConfig;
}
