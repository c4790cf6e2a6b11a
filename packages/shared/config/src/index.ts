/**
 * @crewroom/config - Configuration System
 *
 * Provides TOML parsing, environment variable overlays, validation,
 * and the agent registry.
 */

export type {
  CrewroomConfig,
  PartialCrewroomConfig,
  CrewroomSection,
  ProviderId,
  AgentConfig,
  ProviderRateLimitConfig,
  RetryConfig,
  ContextConfig,
  DispatchPolicy,
  RoutingConfig,
  ToolsConfig,
  CriticConfig,
  ConfigLogLevel,
  RuntimeConfig,
} from './schema.js';

export {
  loadConfig,
  loadTomlFile,
  parseToml,
  findConfigFile,
  getConfigSearchPaths,
  ConfigLoadError,
  CONFIG_FILE_NAME,
  CONFIG_PATH_ENV,
  type LoadedConfig,
} from './loader.js';

export { createEnvOverlay, applyEnvOverlay } from './env.js';

export {
  validateConfig,
  validateConfigOrThrow,
  ConfigValidationError,
  SUPPORTED_PROVIDERS,
  type ValidationResult,
} from './validation.js';

export {
  AgentRegistry,
  toAgentProfile,
  DEFAULT_TEMPERATURE,
  DEFAULT_MAX_TOKENS,
} from './registry.js';

export {
  resolveSettings,
  DEFAULT_WINDOW_SECONDS,
  DEFAULT_SHELL_TIMEOUT_SECONDS,
  type OrchestrationSettings,
  type RateLimitSetting,
} from './settings.js';

export { loadAndValidateConfig, type LoadConfigOptions } from './main.js';
