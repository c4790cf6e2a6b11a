/**
 * @crewroom/orchestrator - runs user messages through configured agents
 *
 * @example
 * ```typescript
 * import { loadAndValidateConfig } from '@crewroom/config';
 * import { createOrchestrationCore } from '@crewroom/orchestrator';
 *
 * const core = createOrchestrationCore(loadAndValidateConfig());
 * const results = await core.runTurn('@Coder add a health check', history, {
 *   confirm: async (request) => askUser(request),
 *   onToken: (agent, chunk) => process.stdout.write(chunk),
 * });
 * ```
 */

export {
  OrchestrationCore,
  type OrchestrationCoreOptions,
  type CoreSettings,
  type TurnHooks,
  type TurnResult,
} from './core.js';

export { createOrchestrationCore, type BootstrapOptions } from './bootstrap.js';

export {
  AgentSelector,
  type AgentSelectorOptions,
  type AgentSelection,
  type DispatchPolicy,
} from './routing/agent-selector.js';

export {
  RateLimiter,
  TokenBucket,
  DEFAULT_PROVIDER_LIMITS,
  DEFAULT_RETRY_POLICY,
  UNLIMITED_TOKENS,
  type ProviderRateLimit,
  type RetryPolicy,
  type RateLimiterConfig,
  type RateLimitStats,
} from './security/rate-limiter.js';

export { TrustLedger, type TrustGrant, type TrustLedgerOptions } from './security/trust-ledger.js';
export { resolveAgentApiKey, hasUsableKey } from './security/api-keys.js';

export { parseToolCalls, parseAttributes, hasToolCalls } from './tools/tool-call-parser.js';
export { ToolRegistry } from './tools/tool-registry.js';
export { ToolGate, type ToolGateOptions } from './tools/tool-gate.js';
export { createDiffPreview } from './tools/diff-preview.js';

export {
  ShadowCritic,
  buildAuditPrompt,
  parseCriticAlert,
  DEFAULT_CRITIC_NAME,
  type AuditRequest,
  type CriticAlert,
  type ShadowCriticOptions,
} from './critic/shadow-critic.js';

export { sleep } from './async-utils.js';
