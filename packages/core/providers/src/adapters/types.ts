import { describeError } from '@crewroom/types';
import type { ProviderCallOptions } from '@crewroom/types';

export type ProviderErrorKind =
  | 'rate_limit'
  | 'server'
  | 'billing'
  | 'auth'
  | 'network'
  | 'invalid_request'
  | 'aborted'
  | 'unknown';

const NON_RETRYABLE: ReadonlySet<ProviderErrorKind> = new Set([
  'auth',
  'billing',
  'invalid_request',
  'aborted',
]);

/** Error names the SDKs and fetch use for a cancelled request */
const ABORT_ERROR_NAMES: ReadonlySet<string> = new Set([
  'AbortError',
  'APIUserAbortError',
  'GoogleGenerativeAIAbortError',
]);

function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (ABORT_ERROR_NAMES.has(error.name) || ABORT_ERROR_NAMES.has(error.constructor.name))
  );
}

/**
 * Upstream call failed (transport, auth, quota)
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly kind: ProviderErrorKind,
    public readonly providerCode?: string
  ) {
    super(message);
    this.name = 'ProviderError';
  }

  /** Whether another attempt could succeed */
  get retryable(): boolean {
    return !NON_RETRYABLE.has(this.kind);
  }
}

/**
 * The backend has no streaming support; callers fall back to `complete`
 */
export class StreamingNotSupportedError extends Error {
  constructor(public readonly providerId: string) {
    super(`Provider '${providerId}' does not support streaming`);
    this.name = 'StreamingNotSupportedError';
  }
}

/**
 * Map an SDK error (which carries an HTTP `status`) to a ProviderError.
 * Anything thrown once the caller's signal has fired counts as aborted.
 */
export function mapProviderError(error: unknown, label: string, signal?: AbortSignal): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  if (signal?.aborted || isAbortError(error)) {
    return new ProviderError(`${label} request aborted`, 'aborted');
  }

  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    const status = error.status;
    const code = String(status);
    if (status === 401 || status === 403) {
      return new ProviderError('Authentication failed', 'auth', code);
    }
    if (status === 402) {
      return new ProviderError('Billing issue', 'billing', code);
    }
    if (status === 429) {
      return new ProviderError('Rate limit exceeded', 'rate_limit', code);
    }
    if (status === 400 || status === 404 || status === 422) {
      return new ProviderError(`Invalid request: ${describeError(error)}`, 'invalid_request', code);
    }
    if (status >= 500) {
      return new ProviderError('Provider unavailable', 'server', code);
    }
  }

  if (error instanceof Error && /timeout|ECONN|fetch failed/i.test(`${error.name} ${error.message}`)) {
    return new ProviderError(`${label} connection failed: ${error.message}`, 'network');
  }

  return new ProviderError(`${label} provider error: ${describeError(error)}`, 'unknown');
}

/**
 * SDK request options for a cancellation signal and absolute deadline
 */
export function toRequestOptions(options: ProviderCallOptions = {}): {
  signal?: AbortSignal;
  timeout?: number;
} {
  const request: { signal?: AbortSignal; timeout?: number } = {};
  if (options.signal) {
    request.signal = options.signal;
  }
  if (options.deadline !== undefined) {
    request.timeout = Math.max(1, options.deadline - Date.now());
  }
  return request;
}
