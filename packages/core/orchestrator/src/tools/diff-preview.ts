/**
 * Unified diff of a proposed file write, rendered by the presentation layer
 */

import { createTwoFilesPatch } from 'diff';

const CONTEXT_LINES = 3;

/**
 * Diff between the current content (empty for new files) and the proposed content.
 * Returns an empty string when nothing would change.
 */
export function createDiffPreview(filePath: string, before: string, after: string): string {
  if (before === after) {
    return '';
  }
  return createTwoFilesPatch(`a/${filePath}`, `b/${filePath}`, before, after, undefined, undefined, {
    context: CONTEXT_LINES,
  });
}
