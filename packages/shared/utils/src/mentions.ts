/**
 * @-mention parsing for operator and agent messages.
 */

const MENTION_PATTERN = /@([a-zA-Z0-9_]+)/g;

/**
 * Return every @-mentioned name in order of appearance, duplicates kept.
 * Names are letters, digits, and underscores; anything else ends the mention.
 */
export function parseMentions(text: string): string[] {
  if (!text) return [];
  return Array.from(text.matchAll(MENTION_PATTERN), (match) => match[1] ?? '').filter(Boolean);
}

/**
 * Remove every literal occurrence of `@name` from the text
 */
export function removeMention(text: string, name: string): string {
  return text.split(`@${name}`).join('');
}

export function isMentioned(text: string, name: string): boolean {
  const lower = name.toLowerCase();
  return parseMentions(text).some((mention) => mention.toLowerCase() === lower);
}
