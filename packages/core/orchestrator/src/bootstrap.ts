/**
 * Wires a validated config into a ready OrchestrationCore
 */
import { AgentRegistry, resolveSettings, type CrewroomConfig } from '@crewroom/config';
import { createEnvCredentialResolver, createProviderFactory } from '@crewroom/providers';
import { createBuiltinTools } from '@crewroom/tools';
import type { ProviderFactory } from '@crewroom/types';
import { createLogger, type Logger } from '@crewroom/utils';
import { OrchestrationCore } from './core.js';
import type { CriticAlert } from './critic/shadow-critic.js';

export interface BootstrapOptions {
  /** Source of API keys (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Workspace root when the config names no allowed paths */
  cwd?: string;
  logger?: Logger;
  /** Replaces the built-in provider adapters */
  providerFactory?: ProviderFactory;
  onCriticAlert?: (alert: CriticAlert) => void;
}

export function createOrchestrationCore(
  config: CrewroomConfig,
  options: BootstrapOptions = {}
): OrchestrationCore {
  const settings = resolveSettings(config, options.cwd);
  const logger = options.logger ?? createLogger('orchestrator', settings.logLevel);

  const directory = AgentRegistry.fromConfig(config);
  const tools = createBuiltinTools({
    allowedPaths: settings.tools.allowedPaths,
    shellEnabled: settings.tools.shellEnabled,
    shellTimeoutSeconds: settings.tools.shellTimeoutSeconds,
    logger,
  });

  logger.info(
    `Loaded ${directory.listAgents().length} agent(s), default ${directory.getDefaultAgentName()}, ` +
      `${tools.length} tool(s)`
  );

  return new OrchestrationCore({
    directory,
    providerFactory: options.providerFactory ?? createProviderFactory({ logger }),
    resolveCredential: createEnvCredentialResolver(options.env),
    settings: {
      rateLimits: settings.rateLimits,
      retry: settings.retry,
      preserveFirstN: settings.preserveFirstN,
      dispatch: settings.dispatch,
      critic: settings.critic,
    },
    tools,
    onCriticAlert: options.onCriticAlert,
    logger,
  });
}
