/**
 * Resolved orchestration settings with defaults applied
 */

import type { CrewroomConfig, DispatchPolicy, ConfigLogLevel } from './schema.js';

export interface RateLimitSetting {
  limit: number;
  /** Seconds */
  window: number;
}

export interface OrchestrationSettings {
  rateLimits: Record<string, RateLimitSetting>;
  retry: {
    enabled: boolean;
    maxRetries: number;
    backoffMultiplier: number;
  };
  preserveFirstN: number;
  dispatch: DispatchPolicy;
  tools: {
    shellEnabled: boolean;
    allowedPaths: string[];
    shellTimeoutSeconds: number;
  };
  critic: {
    enabled: boolean;
    agentName: string;
  };
  logLevel: ConfigLogLevel;
}

export const DEFAULT_WINDOW_SECONDS = 60;
export const DEFAULT_SHELL_TIMEOUT_SECONDS = 30;

export function resolveSettings(config: CrewroomConfig, cwd: string = process.cwd()): OrchestrationSettings {
  const rateLimits: Record<string, RateLimitSetting> = {};
  for (const [provider, entry] of Object.entries(config.rate_limits ?? {})) {
    rateLimits[provider] = { limit: entry.limit, window: entry.window ?? DEFAULT_WINDOW_SECONDS };
  }

  const allowedPaths = config.tools?.allowed_paths;

  return {
    rateLimits,
    retry: {
      enabled: config.retry?.enabled ?? true,
      maxRetries: config.retry?.max_retries ?? 3,
      backoffMultiplier: config.retry?.backoff_multiplier ?? 2,
    },
    preserveFirstN: config.context?.preserve_first_n ?? 0,
    dispatch: config.routing?.dispatch ?? 'all',
    tools: {
      shellEnabled: config.tools?.shell_enabled ?? true,
      allowedPaths: allowedPaths && allowedPaths.length > 0 ? allowedPaths : [cwd],
      shellTimeoutSeconds: config.tools?.shell_timeout ?? DEFAULT_SHELL_TIMEOUT_SECONDS,
    },
    critic: {
      enabled: config.critic?.enabled ?? true,
      agentName: config.critic?.agent ?? 'Critic',
    },
    logLevel: config.runtime?.log_level ?? 'info',
  };
}
