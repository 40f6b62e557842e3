import { ProviderError } from './errors/provider-error';

/**
 * Settles with `promise`, or rejects with an ABORTED ProviderError as soon as
 * `signal` fires. The underlying operation is not cancelled; callers that own
 * a cancellable resource should pass the signal to it as well.
 */
export const raceWithSignal = <T>(
  promise: Promise<T>,
  provider: string,
  signal?: AbortSignal,
): Promise<T> => {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(abortedError(provider, signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortedError(provider, signal));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
};

export const abortedError = (provider: string, signal: AbortSignal): ProviderError =>
  new ProviderError(`${provider} request aborted`, provider, 'ABORTED', true, signal.reason);

export const throwIfAborted = (provider: string, signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw abortedError(provider, signal);
  }
};
