// Shared types for Crewroom

export type {
  MessageRole,
  Message,
  AgentProfile,
  AgentDirectory,
  TokenUsage,
  CompletionResult,
  ProviderCallOptions,
  ProviderCapability,
  ProviderSettings,
  ProviderFactory,
  CredentialResolver,
} from './agent-types.js';

export type {
  ToolArgs,
  ParsedToolCall,
  ToolExecutor,
  FileSnapshot,
  ToolRegistration,
  GateDecision,
  ConfirmationRequest,
  ConfirmationHandler,
  ToolOutcome,
} from './tool-types.js';

export {
  CrewroomError,
  CrewroomErrorCodes,
  type CrewroomErrorCode,
  type CrewroomErrorData,
  type CreateErrorOptions,
  createConfigError,
  createUnknownAgentError,
  createProviderFailedError,
  createValidationError,
  createTimeoutError,
  describeError,
} from './errors.js';

export {
  AgentProfileSchema,
  MessageInputSchema,
  AgentNameSchema,
  type AgentProfileType,
  type MessageInputType,
} from './schemas.js';

export {
  validateOrThrow,
  validateAgentProfile,
  validateAgentName,
  validateMessageInput,
  type ValidationError,
} from './validation.js';
