/**
 * Tool Call Parser
 *
 * Extracts `<tool_call name="X" key="value">BODY</tool_call>` invocations
 * (or the self-closing `<tool_call name="X" key="value" />`) from a model reply.
 * Parsing is pure and never throws; tags without a name are dropped.
 * Bodies keep their whitespace apart from the newlines framing the tags.
 */

import type { ParsedToolCall, ToolArgs } from '@crewroom/types';

const TOOL_CALL_PATTERN =
  /<tool_call\s+((?:"[^"]*"|'[^']*'|[^'">])*?)\s*(?:\/>|>([\s\S]*?)<\/tool_call>)/g;

/** One newline after the opening tag and one before the closing tag */
const LEADING_NEWLINE = /^\r?\n/;
const TRAILING_NEWLINE = /\r?\n$/;

const ATTRIBUTE_PATTERN = /([A-Za-z_][\w-]*)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

/**
 * Parse `key="value"` pairs; later duplicates win
 */
export function parseAttributes(source: string): ToolArgs {
  const attributes: ToolArgs = {};
  for (const match of source.matchAll(ATTRIBUTE_PATTERN)) {
    const [, key, doubleQuoted, singleQuoted] = match;
    if (key !== undefined) {
      attributes[key] = doubleQuoted ?? singleQuoted ?? '';
    }
  }
  return attributes;
}

/**
 * Every well-formed tool call in `text`, in order of appearance
 */
export function parseToolCalls(text: string): ParsedToolCall[] {
  const calls: ParsedToolCall[] = [];

  for (const match of text.matchAll(TOOL_CALL_PATTERN)) {
    const { name, ...args } = parseAttributes(match[1] ?? '');
    if (!name) {
      continue;
    }
    const body = (match[2] ?? '').replace(LEADING_NEWLINE, '').replace(TRAILING_NEWLINE, '');
    calls.push({ name, args, body });
  }

  return calls;
}

export function hasToolCalls(text: string): boolean {
  return parseToolCalls(text).length > 0;
}
