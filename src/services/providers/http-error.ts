import axios from 'axios';
import { abortedError } from '../../utils/abort';
import { ProviderError, describeError } from '../../utils/errors/provider-error';

const HTTP_TOO_MANY_REQUESTS = 429;
const HTTP_SERVER_ERROR = 500;

/**
 * Converts a failed HTTP call into a ProviderError.
 * Network errors, rate limits and 5xx responses are marked retryable.
 */
export const toProviderError = (
  error: unknown,
  provider: string,
  action: string,
  signal?: AbortSignal,
): ProviderError => {
  if (error instanceof ProviderError) {
    return error;
  }

  if (signal?.aborted) {
    return abortedError(provider, signal);
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const retryable =
      status === undefined || status === HTTP_TOO_MANY_REQUESTS || status >= HTTP_SERVER_ERROR;
    const suffix = status === undefined ? error.message : `status ${status}`;
    return new ProviderError(`${action} failed: ${suffix}`, provider, 'FETCH_FAILED', retryable, error);
  }

  return new ProviderError(`${action} failed: ${describeError(error)}`, provider, 'FETCH_FAILED', false, error);
};
