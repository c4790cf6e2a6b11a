/**
 * TypeBox schemas for runtime validation at the orchestration boundaries.
 */

import { Type, type Static } from '@sinclair/typebox';

/** Agent names: letters, numbers, hyphens, underscores */
const NAME_PATTERN = '^[a-zA-Z0-9_-]+$';

export const AgentProfileSchema = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 50, pattern: NAME_PATTERN }),
  provider: Type.String({ minLength: 1 }),
  model: Type.String({ minLength: 1 }),
  systemPrompt: Type.String(),
  temperature: Type.Number({ minimum: 0, maximum: 2 }),
  maxTokens: Type.Integer({ minimum: 1 }),
  apiKeyEnv: Type.String(),
  baseUrl: Type.Optional(Type.String()),
});

/**
 * A message typed by the operator
 */
export const MessageInputSchema = Type.Object({
  content: Type.String({ minLength: 1, maxLength: 50000 }),
  agentTag: Type.Optional(Type.String({ maxLength: 50, pattern: NAME_PATTERN })),
});

export const AgentNameSchema = Type.String({ minLength: 1, maxLength: 50, pattern: NAME_PATTERN });

export type AgentProfileType = Static<typeof AgentProfileSchema>;
export type MessageInputType = Static<typeof MessageInputSchema>;
