import { ClaimtraceError, ValidationError } from './index';

export class APIResponseError extends ValidationError {
  constructor(message: string, public readonly response: unknown, cause?: unknown) {
    super(`API Response Error: ${message}`, cause);
    this.name = 'APIResponseError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, APIResponseError);
    }
  }
}

/**
 * Failure of a request to an LLM or embedding provider.
 * `retryable` marks transient conditions (rate limits, 5xx, network, timeouts)
 * that the worker pool may retry once.
 */
export class ProviderRequestError extends ClaimtraceError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number
  ) {
    super(message, 'PROVIDER_REQUEST_ERROR');
    this.name = 'ProviderRequestError';
  }
}

export class RequestTimeoutError extends ProviderRequestError {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, true);
    this.name = 'RequestTimeoutError';
  }
}

export class RequestAbortedError extends ClaimtraceError {
  constructor(message = 'Request aborted before it was issued') {
    super(message, 'REQUEST_ABORTED');
    this.name = 'RequestAbortedError';
  }
}

const TRANSIENT_STATUS = new Set([408, 409, 429, 500, 502, 503, 504, 529]);

export function isTransientStatus(status: number | undefined): boolean {
  return status !== undefined && TRANSIENT_STATUS.has(status);
}

/**
 * Transient failures are retried by the worker pool; everything else
 * (auth, bad request, malformed structured output) fails immediately.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof ProviderRequestError) return error.retryable;
  if (error instanceof ValidationError) return false;
  if (error instanceof Error) {
    return /ECONNRESET|ETIMEDOUT|ENOTFOUND|EAI_AGAIN|socket hang up|network/i.test(error.message);
  }
  return false;
}

export function isAPIResponseError(error: unknown): error is APIResponseError {
  return error instanceof APIResponseError;
}
