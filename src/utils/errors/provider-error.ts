export type ProviderErrorCode =
  | 'FETCH_FAILED'
  | 'SESSION_START_FAILED'
  | 'WAF_BLOCKED'
  | 'ABORTED'
  | 'INVALID_RESPONSE'
  | 'NO_DATA'
  | 'UNSUPPORTED';

/**
 * Raised by a price provider when it cannot serve a request.
 * `retryable` marks transient failures (network, timeouts, rate limits).
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly code: ProviderErrorCode = 'FETCH_FAILED',
    public readonly retryable: boolean = false,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
