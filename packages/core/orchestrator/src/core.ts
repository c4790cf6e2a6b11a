/**
 * Orchestration Core - drives one user message through the agents it selects
 *
 * Per selected agent: resolve the profile and key, wait for rate-limit
 * admission, trim the context, stream the reply (falling back to a plain
 * completion) and retry provider failures with backoff. Tool calls in the
 * reply then pass through the gate, and the reply is checked for a handoff.
 *
 * Buckets, grants and provider handles belong to the instance, so separate
 * rooms and tests run isolated cores.
 */
import {
  createConfigError,
  createProviderFailedError,
  describeError,
  validateMessageInput,
  type AgentDirectory,
  type AgentProfile,
  type CompletionResult,
  type ConfirmationHandler,
  type CredentialResolver,
  type Message,
  type ParsedToolCall,
  type ProviderCapability,
  type ProviderFactory,
  type TokenUsage,
  type ToolOutcome,
  type ToolRegistration,
} from '@crewroom/types';
import { silentLogger, type Logger } from '@crewroom/utils';
import { ContextBudgeter, type ContextTokenUsage } from '@crewroom/context-manager';
import { ProviderError, StreamingNotSupportedError, filterKeysFromText } from '@crewroom/providers';
import { sleep as defaultSleep } from './async-utils.js';
import { RateLimiter, type ProviderRateLimit, type RetryPolicy } from './security/rate-limiter.js';
import { TrustLedger } from './security/trust-ledger.js';
import { hasUsableKey, resolveAgentApiKey } from './security/api-keys.js';
import { AgentSelector, type DispatchPolicy } from './routing/agent-selector.js';
import { parseToolCalls } from './tools/tool-call-parser.js';
import { ToolRegistry } from './tools/tool-registry.js';
import { ToolGate } from './tools/tool-gate.js';
import { ShadowCritic, DEFAULT_CRITIC_NAME, type CriticAlert } from './critic/shadow-critic.js';

export interface CoreSettings {
  /** Merged over the built-in per-provider limits */
  rateLimits: Record<string, ProviderRateLimit>;
  retry: RetryPolicy;
  /** Grounding messages after the system prompt that are never trimmed */
  preserveFirstN: number;
  dispatch: DispatchPolicy;
  critic: {
    enabled: boolean;
    agentName: string;
  };
}

export interface OrchestrationCoreOptions {
  directory: AgentDirectory;
  providerFactory: ProviderFactory;
  resolveCredential: CredentialResolver;
  settings?: Partial<CoreSettings>;
  tools?: ToolRegistration[];
  budgeter?: ContextBudgeter;
  onCriticAlert?: (alert: CriticAlert) => void;
  /** Clock in epoch milliseconds for the limiter and trust ledger */
  now?: () => number;
  /** Used between retries and while waiting for rate-limit tokens */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

export interface TurnHooks {
  /** Asked before a gated tool call runs; without it every gated call is declined */
  confirm?: ConfirmationHandler;
  onAgentStart?: (agentName: string) => void;
  onToken?: (agentName: string, chunk: string) => void;
  /** A failed call is about to be retried; text streamed for it so far is void */
  onRetry?: (agentName: string, attempt: number, delaySeconds: number) => void;
  signal?: AbortSignal;
}

export interface TurnResult {
  agentName: string;
  reply: string;
  usage?: TokenUsage;
  /** Estimated usage of the trimmed context plus the reply */
  contextUsage: ContextTokenUsage;
  toolOutcomes: ToolOutcome[];
  /** Agent the reply hands over to */
  handoff?: string;
}

const DEFAULT_SETTINGS: CoreSettings = {
  rateLimits: {},
  retry: { enabled: true, maxRetries: 3, backoffMultiplier: 2 },
  preserveFirstN: 0,
  dispatch: 'all',
  critic: { enabled: true, agentName: DEFAULT_CRITIC_NAME },
};

const declineAll: ConfirmationHandler = async () => false;

function describeCall(call: ParsedToolCall): string {
  return `${call.name}: ${call.body || JSON.stringify(call.args)}`;
}

export class OrchestrationCore {
  readonly limiter: RateLimiter;
  readonly trust: TrustLedger;
  readonly selector: AgentSelector;
  readonly tools: ToolRegistry;
  readonly gate: ToolGate;
  readonly budgeter: ContextBudgeter;
  readonly critic?: ShadowCritic;

  private directory: AgentDirectory;
  private resolveCredential: CredentialResolver;
  private settings: CoreSettings;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private logger: Logger;
  private pendingAudits = new Set<Promise<void>>();

  constructor(options: OrchestrationCoreOptions) {
    this.directory = options.directory;
    this.resolveCredential = options.resolveCredential;
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? silentLogger;

    this.limiter = new RateLimiter({
      limits: this.settings.rateLimits,
      retry: this.settings.retry,
      now: options.now,
      sleep: this.sleep,
      logger: this.logger,
    });
    this.trust = new TrustLedger({ now: options.now, logger: this.logger });
    this.selector = new AgentSelector({
      directory: options.directory,
      providerFactory: options.providerFactory,
      dispatch: this.settings.dispatch,
      logger: this.logger,
    });
    this.tools = new ToolRegistry();
    this.tools.registerAll(options.tools ?? []);
    this.gate = new ToolGate({ registry: this.tools, trust: this.trust, logger: this.logger });
    this.budgeter = options.budgeter ?? new ContextBudgeter({ logger: this.logger });

    if (this.settings.critic.enabled) {
      this.critic = new ShadowCritic({
        directory: options.directory,
        providerFactory: options.providerFactory,
        resolveCredential: options.resolveCredential,
        criticName: this.settings.critic.agentName,
        onAlert: options.onCriticAlert,
        logger: this.logger,
      });
    }
  }

  /**
   * Answer one user message with every selected agent, in order.
   * Later agents see the replies of earlier ones.
   *
   * @throws CrewroomError (VALIDATION) for empty, oversized or null-byte input
   */
  async runTurn(text: string, history: readonly Message[], hooks: TurnHooks = {}): Promise<TurnResult[]> {
    const { content } = validateMessageInput(text);
    const { agents, cleanedText } = this.selector.selectAgents(content);
    const conversation: Message[] = [...history, { role: 'user', content: cleanedText }];
    const results: TurnResult[] = [];

    for (const agentName of agents) {
      const result = await this.runAgent(agentName, cleanedText, conversation, hooks);
      results.push(result);
      conversation.push({ role: 'assistant', content: result.reply, agentTag: result.agentName });
    }

    return results;
  }

  /**
   * Wait for the background audits started so far
   */
  async flushAudits(): Promise<void> {
    await Promise.all([...this.pendingAudits]);
  }

  buildSystemPrompt(profile: AgentProfile): string {
    const tools = this.tools.describe();
    return tools ? `${profile.systemPrompt}\n\n${tools}` : profile.systemPrompt;
  }

  private async runAgent(
    agentName: string,
    userText: string,
    conversation: readonly Message[],
    hooks: TurnHooks
  ): Promise<TurnResult> {
    const profile = this.directory.getAgent(agentName);
    const apiKey = resolveAgentApiKey(profile, this.resolveCredential);
    if (!hasUsableKey(profile, apiKey)) {
      throw createConfigError(`API key for ${profile.apiKeyEnv || profile.provider} not found`, {
        component: 'orchestrator',
        details: { agentName: profile.name, provider: profile.provider },
      });
    }

    hooks.onAgentStart?.(profile.name);
    const provider = this.selector.getProviderForAgent(profile.name, apiKey);

    const messages = this.budgeter.trim(conversation, {
      systemPrompt: this.buildSystemPrompt(profile),
      maxTokens: profile.maxTokens,
      preserveFirstN: this.settings.preserveFirstN,
    });

    const completion = await this.callWithRetry(profile, provider, apiKey, messages, hooks);
    const reply = completion.content;

    const toolOutcomes: ToolOutcome[] = [];
    for (const call of parseToolCalls(reply)) {
      const outcome = await this.gate.process(profile.name, call, hooks.confirm ?? declineAll);
      toolOutcomes.push(outcome);
      if (outcome.status === 'executed') {
        this.startAudit(profile.name, call, outcome.output, userText);
      }
    }

    const handoff = this.selector.detectHandoff(reply, profile.name);
    return {
      agentName: profile.name,
      reply,
      ...(completion.usage ? { usage: completion.usage } : {}),
      contextUsage: this.budgeter.tokenUsage(
        [...messages, { role: 'assistant', content: reply }],
        profile.maxTokens
      ),
      toolOutcomes,
      ...(handoff !== undefined ? { handoff } : {}),
    };
  }

  private async callWithRetry(
    profile: AgentProfile,
    provider: ProviderCapability,
    apiKey: string,
    messages: readonly Message[],
    hooks: TurnHooks
  ): Promise<CompletionResult> {
    const providerId = profile.provider;
    // provider messages can echo the request, key included
    const describeSafely = (error: unknown): string =>
      filterKeysFromText(describeError(error), [apiKey]);

    try {
      for (;;) {
        // waiting does not reserve a token; another turn may take it first
        while (!this.limiter.checkLimit(providerId)) {
          await this.limiter.waitIfNeeded(providerId, 1, hooks.signal);
        }

        try {
          return await this.generate(profile.name, provider, messages, hooks);
        } catch (error) {
          const retryable = error instanceof ProviderError && error.retryable;
          if (!retryable || !this.limiter.shouldRetry(providerId)) {
            const message = `${profile.name} (${providerId}) failed: ${describeSafely(error)}`;
            throw createProviderFailedError(message, {
              component: 'orchestrator',
              details: {
                agentName: profile.name,
                provider: providerId,
                ...(error instanceof ProviderError ? { kind: error.kind } : {}),
              },
              cause: error instanceof Error ? error : undefined,
            });
          }

          const delaySeconds = this.limiter.getBackoffTime(providerId);
          const attempt = this.limiter.incrementRetryCount(providerId);
          this.logger.warn(
            `${providerId} call for ${profile.name} failed (${describeSafely(error)}), retry ${attempt} in ${delaySeconds}s`
          );
          hooks.onRetry?.(profile.name, attempt, delaySeconds);
          await this.sleep(delaySeconds * 1000, hooks.signal);
        }
      }
    } finally {
      this.limiter.resetRetryCount(providerId);
    }
  }

  private async generate(
    agentName: string,
    provider: ProviderCapability,
    messages: readonly Message[],
    hooks: TurnHooks
  ): Promise<CompletionResult> {
    const options = { signal: hooks.signal };

    try {
      let content = '';
      for await (const chunk of provider.stream(messages, undefined, options)) {
        content += chunk;
        hooks.onToken?.(agentName, chunk);
      }
      return { content };
    } catch (error) {
      if (!(error instanceof StreamingNotSupportedError)) {
        throw error;
      }
      this.logger.debug(`${provider.providerId} cannot stream; using a plain completion`);
    }

    const result = await provider.complete(messages, undefined, options);
    hooks.onToken?.(agentName, result.content);
    return result;
  }

  private startAudit(agentName: string, call: ParsedToolCall, output: string, context: string): void {
    if (!this.critic) {
      return;
    }
    const audit = this.critic
      .auditInBackground({ agentName, action: describeCall(call), result: output, context })
      .finally(() => {
        this.pendingAudits.delete(audit);
      });
    this.pendingAudits.add(audit);
  }
}
