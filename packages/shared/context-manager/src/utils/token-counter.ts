/**
 * Token Counter - Token estimation utilities for context management
 *
 * Heuristic estimation at four characters per token. This is an
 * approximation, not a tokenizer: consistent and deterministic, not exact.
 * A provider tokenizer can stand in through the TokenEstimator interface.
 */

import type { Message } from '@crewroom/types';

/**
 * Overhead tokens per message (role, structure, formatting)
 */
export const MESSAGE_OVERHEAD = 4;

/**
 * Overhead for the response framing of any request
 */
export const BASELINE_OVERHEAD = 3;

/**
 * Anything that can count tokens in a text
 */
export interface TokenEstimator {
  estimate(text: string): number;
}

/**
 * Character-based estimator
 */
export class HeuristicTokenEstimator implements TokenEstimator {
  constructor(private readonly charsPerToken = 4) {}

  /**
   * Estimate tokens for a text string; at least 1 for non-empty text.
   * Counts code points, so a surrogate pair is one character.
   */
  estimate(text: string): number {
    if (!text) {
      return 0;
    }

    return Math.max(1, Math.floor([...text].length / this.charsPerToken));
  }
}

/**
 * Default estimator instance
 */
export const tokenEstimator: TokenEstimator = new HeuristicTokenEstimator();

export function estimateTokens(text: string): number {
  return tokenEstimator.estimate(text);
}

/**
 * Cost of one message including its framing overhead
 */
export function estimateMessageTokens(
  message: Pick<Message, 'content'>,
  estimator: TokenEstimator = tokenEstimator
): number {
  return estimator.estimate(message.content) + MESSAGE_OVERHEAD;
}

/**
 * Cost of a message list, including the trailing response overhead
 */
export function estimateMessagesTokens(
  messages: readonly Pick<Message, 'content'>[],
  estimator: TokenEstimator = tokenEstimator
): number {
  let total = 0;
  for (const message of messages) {
    total += estimateMessageTokens(message, estimator);
  }
  return total + BASELINE_OVERHEAD;
}

// Ordered: the first substring match wins, so more specific names come first
const CONTEXT_WINDOWS: ReadonlyArray<readonly [string, number]> = [
  ['gemini-1.5-pro', 2_000_000],
  ['gemini-1.5-flash', 1_000_000],
  ['gemini-1.0-pro', 32_768],
  ['claude-3', 200_000],
  ['claude-2', 100_000],
  ['gpt-4o', 128_000],
  ['gpt-4-turbo', 128_000],
  ['gpt-4', 8_192],
  ['gpt-3.5-turbo', 16_385],
];

export const DEFAULT_CONTEXT_WINDOW = 4_096;

/**
 * Maximum context window for a model name, by case-insensitive substring
 */
export function getMaxContext(model: string): number {
  const name = model.toLowerCase();
  for (const [fragment, size] of CONTEXT_WINDOWS) {
    if (name.includes(fragment)) return size;
  }
  return DEFAULT_CONTEXT_WINDOW;
}
