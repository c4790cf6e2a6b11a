/**
 * One-call configuration loading: read, overlay env, validate
 */

import type { Logger } from '@crewroom/utils';
import type { CrewroomConfig } from './schema.js';
import { loadConfig } from './loader.js';
import { applyEnvOverlay } from './env.js';
import { validateConfigOrThrow } from './validation.js';

export interface LoadConfigOptions {
  /** Explicit crewroom.toml; otherwise the search path is used */
  configPath?: string;
  /** Source of CREWROOM_* overrides and CREWROOM_CONFIG (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Apply CREWROOM_* overrides (default true) */
  applyEnv?: boolean;
  /** Run validation (default true) */
  validate?: boolean;
  /** Receives validation warnings and the resolved file path */
  logger?: Logger;
}

/**
 * @throws ConfigLoadError when no file is found or it does not parse
 * @throws ConfigValidationError when the merged config is invalid
 */
export function loadAndValidateConfig(options: LoadConfigOptions = {}): CrewroomConfig {
  const { configPath, env = process.env, applyEnv = true, validate = true, logger } = options;

  const loaded = loadConfig(configPath, env);
  logger?.debug(`Loaded configuration from ${loaded.path}`);

  const config = applyEnv ? applyEnvOverlay(loaded.config, env) : loaded.config;
  if (validate) {
    validateConfigOrThrow(config, logger);
  }
  return config;
}
