/**
 * Configuration Validation
 *
 * Validates crewroom.toml configuration for correctness and safety
 */

import type { Logger } from '@crewroom/utils';
import type { AgentConfig, CrewroomConfig } from './schema.js';

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: string[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const SUPPORTED_PROVIDERS = ['openai', 'anthropic', 'ollama', 'gemini'];
const AGENT_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim() === '';
}

/**
 * Validate core crewroom settings
 */
function validateCrewroomSection(config: CrewroomConfig, errors: string[]): void {
  if (!config.crewroom) {
    errors.push('Missing required [crewroom] section');
    return;
  }

  if (isBlank(config.crewroom.name)) {
    errors.push('crewroom.name is required and cannot be empty');
  }

  if (isBlank(config.crewroom.version)) {
    errors.push('crewroom.version is required and cannot be empty');
  }
}

function validateAgent(name: string, agent: AgentConfig, errors: string[], warnings: string[]): void {
  const prefix = `agents.${name}`;

  if (!AGENT_NAME_PATTERN.test(name) || name.length > 50) {
    errors.push(`${prefix}: agent names may only contain letters, numbers, hyphens, and underscores`);
  }

  if (!SUPPORTED_PROVIDERS.includes(agent.provider)) {
    errors.push(
      `Invalid ${prefix}.provider: "${agent.provider}". Must be one of: ${SUPPORTED_PROVIDERS.join(', ')}`
    );
  }

  if (isBlank(agent.model)) {
    errors.push(`${prefix}.model is required and cannot be empty`);
  }

  if (typeof agent.system_prompt !== 'string') {
    errors.push(`${prefix}.system_prompt is required`);
  }

  if (isBlank(agent.api_key_env) && agent.provider !== 'ollama') {
    errors.push(`${prefix}.api_key_env is required`);
  }

  if (agent.temperature !== undefined && (agent.temperature < 0 || agent.temperature > 2)) {
    errors.push(`${prefix}.temperature must be between 0 and 2`);
  }

  if (agent.max_tokens !== undefined && (agent.max_tokens < 1 || agent.max_tokens > 2000000)) {
    errors.push(`${prefix}.max_tokens must be between 1 and 2,000,000`);
  }

  if (agent.provider === 'ollama' && !agent.base_url) {
    warnings.push(`${prefix}.base_url should be specified for the Ollama provider`);
  }
}

/**
 * Validate the agent table and default agent
 */
function validateAgents(config: CrewroomConfig, errors: string[], warnings: string[]): void {
  if (!config.agents || Object.keys(config.agents).length === 0) {
    errors.push('At least one [agents.<Name>] section is required');
    return;
  }

  for (const [name, agent] of Object.entries(config.agents)) {
    validateAgent(name, agent, errors, warnings);
  }

  if (isBlank(config.default_agent)) {
    errors.push('default_agent is required and cannot be empty');
    return;
  }

  const lower = config.default_agent.toLowerCase();
  if (!Object.keys(config.agents).some((name) => name.toLowerCase() === lower)) {
    errors.push(`default_agent "${config.default_agent}" is not a configured agent`);
  }
}

function validateRateLimits(config: CrewroomConfig, errors: string[]): void {
  if (!config.rate_limits) return;

  for (const [provider, limit] of Object.entries(config.rate_limits)) {
    if (typeof limit.limit !== 'number' || limit.limit < 1) {
      errors.push(`rate_limits.${provider}.limit must be at least 1`);
    }
    if (limit.window !== undefined && limit.window <= 0) {
      errors.push(`rate_limits.${provider}.window must be greater than 0`);
    }
  }
}

function validateRetry(config: CrewroomConfig, errors: string[]): void {
  if (!config.retry) return;

  const { max_retries, backoff_multiplier } = config.retry;
  if (max_retries !== undefined && (!Number.isInteger(max_retries) || max_retries < 0)) {
    errors.push('retry.max_retries must be a non-negative integer');
  }
  if (backoff_multiplier !== undefined && backoff_multiplier < 1) {
    errors.push('retry.backoff_multiplier must be at least 1');
  }
}

function validateBehaviour(config: CrewroomConfig, errors: string[], warnings: string[]): void {
  const preserve = config.context?.preserve_first_n;
  if (preserve !== undefined && (!Number.isInteger(preserve) || preserve < 0)) {
    errors.push('context.preserve_first_n must be a non-negative integer');
  }

  const dispatch = config.routing?.dispatch;
  if (dispatch !== undefined && dispatch !== 'all' && dispatch !== 'first') {
    errors.push(`Invalid routing.dispatch: "${String(dispatch)}". Must be one of: all, first`);
  }

  if (config.tools?.shell_timeout !== undefined && config.tools.shell_timeout < 1) {
    errors.push('tools.shell_timeout must be at least 1 second');
  }

  if (config.tools?.shell_enabled) {
    warnings.push('tools.shell_enabled = true lets agents run commands once trusted');
  }

  if (config.critic?.enabled) {
    const criticName = (config.critic.agent ?? 'Critic').toLowerCase();
    const configured = Object.keys(config.agents ?? {}).some(
      (name) => name.toLowerCase() === criticName
    );
    if (!configured) {
      warnings.push(`critic.enabled = true but no "${config.critic.agent ?? 'Critic'}" agent is configured`);
    }
  }

  const validLogLevels = ['debug', 'info', 'warn', 'error', 'silent'];
  const logLevel = config.runtime?.log_level;
  if (logLevel !== undefined && !validLogLevels.includes(logLevel)) {
    errors.push(
      `Invalid runtime.log_level: "${logLevel}". Must be one of: ${validLogLevels.join(', ')}`
    );
  }
}

/**
 * Validate complete configuration
 */
export function validateConfig(config: CrewroomConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  validateCrewroomSection(config, errors);
  validateAgents(config, errors, warnings);
  validateRateLimits(config, errors);
  validateRetry(config, errors);
  validateBehaviour(config, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate configuration and throw if invalid; warnings go to the logger
 */
export function validateConfigOrThrow(config: CrewroomConfig, logger?: Logger): void {
  const result = validateConfig(config);

  if (!result.valid) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${result.errors.join('\n')}`,
      result.errors
    );
  }

  for (const warning of result.warnings) {
    logger?.warn(`Configuration warning: ${warning}`);
  }
}
