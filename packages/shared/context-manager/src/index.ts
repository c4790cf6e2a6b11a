/**
 * @crewroom/context-manager - token-bounded conversation context
 *
 * @example
 * ```typescript
 * import { ContextBudgeter } from '@crewroom/context-manager';
 *
 * const budgeter = new ContextBudgeter();
 * const context = budgeter.trim(history, {
 *   systemPrompt: agent.systemPrompt,
 *   maxTokens: agent.maxTokens,
 *   preserveFirstN: 2,
 * });
 * ```
 */

export { ContextBudgeter, type ContextBudgeterOptions } from './budget/budgeter.js';

export {
  HeuristicTokenEstimator,
  tokenEstimator,
  estimateTokens,
  estimateMessageTokens,
  estimateMessagesTokens,
  getMaxContext,
  MESSAGE_OVERHEAD,
  BASELINE_OVERHEAD,
  DEFAULT_CONTEXT_WINDOW,
  type TokenEstimator,
} from './utils/token-counter.js';

export type { TrimOptions, ContextTokenUsage } from './types/index.js';
