/**
 * Context Budgeter
 *
 * Trims a conversation to a token ceiling while keeping pinned messages:
 * the system prompt and the first N grounding messages after it.
 */

import type { Message } from '@crewroom/types';
import type { Logger } from '@crewroom/utils';
import {
  BASELINE_OVERHEAD,
  estimateMessageTokens,
  estimateMessagesTokens,
  tokenEstimator,
  type TokenEstimator,
} from '../utils/token-counter.js';
import type { ContextTokenUsage, TrimOptions } from '../types/index.js';

export interface ContextBudgeterOptions {
  estimator?: TokenEstimator;
  logger?: Logger;
}

export class ContextBudgeter {
  private readonly estimator: TokenEstimator;
  private readonly logger?: Logger;

  constructor(options: ContextBudgeterOptions = {}) {
    this.estimator = options.estimator ?? tokenEstimator;
    this.logger = options.logger;
  }

  /**
   * Build the message list to send, newest history first to fill the budget.
   *
   * When the pinned set alone does not fit, only the first pinned message
   * (normally the system prompt) is returned.
   */
  trim(messages: readonly Message[], options: TrimOptions): Message[] {
    const { systemPrompt, maxTokens, preserveFirstN = 0 } = options;

    const full: Message[] = [];
    if (systemPrompt) {
      full.push({ role: 'system', content: systemPrompt });
    }
    for (const message of messages) {
      if (systemPrompt && message.role === 'system') continue;
      full.push(message);
    }

    if (full.length === 0) {
      return [];
    }

    const pinned = new Set<number>();
    if (full[0]?.role === 'system') {
      pinned.add(0);
    }
    const firstUnpinned = pinned.size;
    for (let i = firstUnpinned; i < firstUnpinned + preserveFirstN && i < full.length; i++) {
      pinned.add(i);
    }

    const pinnedMessages = full.filter((_, index) => pinned.has(index));
    const fixedTokens = pinnedMessages.reduce(
      (sum, message) => sum + estimateMessageTokens(message, this.estimator),
      0
    );

    if (BASELINE_OVERHEAD + fixedTokens > maxTokens) {
      this.logger?.warn(
        `Pinned messages need ${BASELINE_OVERHEAD + fixedTokens} tokens, over the ${maxTokens} budget`
      );
      return pinnedMessages.slice(0, 1);
    }

    const budget = maxTokens - BASELINE_OVERHEAD - fixedTokens;
    const recent: Message[] = [];
    let used = 0;

    for (let i = full.length - 1; i >= 0; i--) {
      if (pinned.has(i)) continue;
      const message = full[i];
      if (!message) continue;

      const cost = estimateMessageTokens(message, this.estimator);
      if (used + cost > budget) break;

      recent.unshift(message);
      used += cost;
    }

    const dropped = full.length - pinnedMessages.length - recent.length;
    if (dropped > 0) {
      this.logger?.debug(`Trimmed ${dropped} older message(s) to fit ${maxTokens} tokens`);
    }

    return [...pinnedMessages, ...recent];
  }

  /**
   * Report estimated usage of a message list against a ceiling
   */
  tokenUsage(messages: readonly Message[], maxTokens: number): ContextTokenUsage {
    const totalTokens = estimateMessagesTokens(messages, this.estimator);
    return {
      totalTokens,
      maxTokens,
      usagePercent: maxTokens > 0 ? Math.floor((totalTokens / maxTokens) * 100) : 0,
    };
  }
}
