/**
 * Agent Selector - decides which agents answer a message
 */
import type { AgentDirectory, ProviderCapability, ProviderFactory } from '@crewroom/types';
import { parseMentions, removeMention, silentLogger, type Logger } from '@crewroom/utils';

/**
 * `all` answers with every valid mention in order; `first` with the first only
 */
export type DispatchPolicy = 'all' | 'first';

export interface AgentSelection {
  /** Canonical agent names, in mention order, without duplicates */
  agents: string[];
  /** Message text with the routed mentions removed */
  cleanedText: string;
}

export interface AgentSelectorOptions {
  directory: AgentDirectory;
  providerFactory: ProviderFactory;
  dispatch?: DispatchPolicy;
  logger?: Logger;
}

export class AgentSelector {
  private directory: AgentDirectory;
  private providerFactory: ProviderFactory;
  private dispatch: DispatchPolicy;
  private logger: Logger;
  private providers = new Map<string, ProviderCapability>();

  constructor(options: AgentSelectorOptions) {
    this.directory = options.directory;
    this.providerFactory = options.providerFactory;
    this.dispatch = options.dispatch ?? 'all';
    this.logger = options.logger ?? silentLogger;
  }

  parseMentions(text: string): string[] {
    return parseMentions(text);
  }

  /**
   * Route a message. Mentions of unconfigured agents are left in the text;
   * with no valid mention the default agent answers.
   */
  selectAgents(text: string): AgentSelection {
    const routed: Array<{ mention: string; agent: string }> = [];
    const seen = new Set<string>();

    for (const mention of parseMentions(text)) {
      const agent = this.directory.resolveName(mention);
      if (agent === undefined) {
        continue;
      }
      if (this.dispatch === 'first' && routed.length > 0 && !seen.has(agent)) {
        continue;
      }
      routed.push({ mention, agent });
      seen.add(agent);
    }

    if (routed.length === 0) {
      return { agents: [this.directory.getDefaultAgentName()], cleanedText: text.trim() };
    }

    // longest first so `@Code` never eats the front of `@Coder`
    const mentions = [...new Set(routed.map((entry) => entry.mention))].sort(
      (a, b) => b.length - a.length
    );
    const cleanedText = mentions.reduce((current, mention) => removeMention(current, mention), text);

    const agents = [...seen];
    this.logger.debug(`Routing to ${agents.join(', ')}`);
    return { agents, cleanedText: cleanedText.trim() };
  }

  /**
   * First configured agent mentioned in a reply, other than the one replying
   */
  detectHandoff(replyText: string, currentAgent: string): string | undefined {
    const current = currentAgent.toLowerCase();
    for (const mention of parseMentions(replyText)) {
      const agent = this.directory.resolveName(mention);
      if (agent !== undefined && agent.toLowerCase() !== current) {
        return agent;
      }
    }
    return undefined;
  }

  /**
   * Provider handle for an agent, built once per agent for the life of the selector
   */
  getProviderForAgent(agentName: string, apiKey: string): ProviderCapability {
    const profile = this.directory.getAgent(agentName);
    const cached = this.providers.get(profile.name);
    if (cached) {
      return cached;
    }

    const provider = this.providerFactory(
      profile.provider,
      {
        model: profile.model,
        temperature: profile.temperature,
        maxTokens: profile.maxTokens,
        ...(profile.baseUrl ? { baseUrl: profile.baseUrl } : {}),
      },
      apiKey
    );
    this.providers.set(profile.name, provider);
    return provider;
  }
}
