/**
 * Crewroom Error Types and Factory Functions
 *
 * Standardized error handling across the orchestration packages.
 * Every error carries the component that raised it, a code, and optional details.
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * All Crewroom error codes
 */
export const CrewroomErrorCodes = {
  /** Configuration error (unknown provider, missing key, bad settings) */
  CONFIG: 'CREWROOM_ERR_CONFIG',
  /** Agent name does not resolve to a configured agent */
  UNKNOWN_AGENT: 'CREWROOM_ERR_UNKNOWN_AGENT',
  /** Upstream provider call failed after retries */
  PROVIDER_FAILED: 'CREWROOM_ERR_PROVIDER_FAILED',
  /** Input validation failed */
  VALIDATION: 'CREWROOM_ERR_VALIDATION',
  /** Operation timed out or was aborted */
  TIMEOUT: 'CREWROOM_ERR_TIMEOUT',
} as const;

export type CrewroomErrorCode = (typeof CrewroomErrorCodes)[keyof typeof CrewroomErrorCodes];

// ============================================================================
// Error Interface
// ============================================================================

export interface CrewroomErrorData {
  /** Error code */
  code: CrewroomErrorCode;
  /** Human-readable error message */
  message: string;
  /** Component that generated the error */
  component: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Original error if wrapping another error */
  cause?: Error;
}

// ============================================================================
// CrewroomError Class
// ============================================================================

/**
 * Base error class for all Crewroom errors
 */
export class CrewroomError extends Error {
  readonly code: CrewroomErrorCode;
  readonly component: string;
  readonly details?: Record<string, unknown>;
  readonly timestamp: string;

  constructor(data: CrewroomErrorData) {
    super(data.message);
    this.name = 'CrewroomError';
    this.code = data.code;
    this.component = data.component;
    this.details = data.details;
    this.timestamp = data.timestamp;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CrewroomError);
    }

    if (data.cause) {
      this.cause = data.cause;
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      component: this.component,
      details: this.details,
      timestamp: this.timestamp,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message} (component: ${this.component})`;
  }
}

// ============================================================================
// Error Factory Functions
// ============================================================================

export interface CreateErrorOptions {
  /** Component that generated the error */
  component: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Original error if wrapping */
  cause?: Error;
}

function createError(
  code: CrewroomErrorCode,
  message: string,
  options: CreateErrorOptions
): CrewroomError {
  return new CrewroomError({
    code,
    message,
    timestamp: new Date().toISOString(),
    ...options,
  });
}

/**
 * Create a configuration error
 */
export function createConfigError(message: string, options: CreateErrorOptions): CrewroomError {
  return createError(CrewroomErrorCodes.CONFIG, message, options);
}

/**
 * Create an unknown agent error
 */
export function createUnknownAgentError(
  agentName: string,
  options: CreateErrorOptions
): CrewroomError {
  return createError(
    CrewroomErrorCodes.UNKNOWN_AGENT,
    `Agent '${agentName}' not found in configuration`,
    { ...options, details: { agentName, ...options.details } }
  );
}

/**
 * Create a provider failed error
 */
export function createProviderFailedError(
  message: string,
  options: CreateErrorOptions
): CrewroomError {
  return createError(CrewroomErrorCodes.PROVIDER_FAILED, message, options);
}

/**
 * Create a validation error
 */
export function createValidationError(message: string, options: CreateErrorOptions): CrewroomError {
  return createError(CrewroomErrorCodes.VALIDATION, message, options);
}

/**
 * Create a timeout error
 */
export function createTimeoutError(message: string, options: CreateErrorOptions): CrewroomError {
  return createError(CrewroomErrorCodes.TIMEOUT, message, options);
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Render any thrown value as a one-line message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
