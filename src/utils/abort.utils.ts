import { EngineError } from './errors';

export const abortReason = (signal: AbortSignal): Error =>
  signal.reason instanceof Error ? signal.reason : new EngineError('QUERY_TIMEOUT', 'Operation aborted');

export const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
};

/**
 * Settles with `promise`, or rejects as soon as `signal` aborts. The
 * underlying work keeps running for anyone else awaiting it.
 */
export const raceWithSignal = <T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> => {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
};
