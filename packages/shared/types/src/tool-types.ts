/**
 * Tool Types
 *
 * Core types for parsing, registering, gating, and executing tool calls
 * proposed by a model.
 */

/**
 * Named string arguments taken from tag attributes
 */
export type ToolArgs = Record<string, string>;

/**
 * A tool invocation extracted from a model reply
 */
export interface ParsedToolCall {
  name: string;
  args: ToolArgs;
  body: string;
}

/**
 * Executes one tool. Failures are reported in the returned text.
 */
export interface ToolExecutor {
  execute(args: ToolArgs): Promise<string>;
}

/**
 * Current content of a file a tool is about to replace
 */
export interface FileSnapshot {
  /** Resolved absolute path */
  path: string;
  /** Empty when the file does not exist yet */
  content: string;
}

/**
 * Registration metadata for a tool
 */
export interface ToolRegistration {
  /** Name used in `<tool_call name="...">` */
  name: string;

  /** Description for the system prompt */
  description: string;

  /** Argument the tag body fills when the attribute is absent */
  primaryArg?: string;

  /** Fill the primary argument with the body as written instead of trimmed (file content) */
  preserveBody?: boolean;

  /** Whether a diff preview must precede confirmation (file writes) */
  requiresDiffPreview?: boolean;

  /** Reads what a write would replace, for the diff preview */
  readCurrent?: (args: ToolArgs) => Promise<FileSnapshot>;

  executor: ToolExecutor;
}

/**
 * Outcome of gating a tool call
 */
export interface GateDecision {
  autoExecute: boolean;
  requiresConfirmation: boolean;
  requiresDiffPreview: boolean;
}

/**
 * What the presentation layer receives when consent is needed
 */
export interface ConfirmationRequest {
  agentName: string;
  call: ParsedToolCall;
  args: ToolArgs;
  /** Unified diff of the proposed write, when the tool requires one */
  diff?: string;
}

/**
 * Asks the human for consent; resolves true when approved
 */
export type ConfirmationHandler = (request: ConfirmationRequest) => Promise<boolean>;

/**
 * Result of processing one call through the gate
 */
export interface ToolOutcome {
  call: ParsedToolCall;
  status: 'executed' | 'declined' | 'unknown_tool';
  autoExecuted: boolean;
  output: string;
}
