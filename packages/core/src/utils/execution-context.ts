import { withTimeout } from './retry';

import type { ExecutionContext } from '../types';

/**
 * Run a driver call under an execution context: reject up front when the
 * signal is already aborted, reject with the signal's reason when it aborts
 * mid-flight, and reject with a TimeoutError once `timeout` elapses.
 *
 * The driver call itself is not cancelled; its eventual result is dropped.
 */
export async function runWithContext<T>(
  call: () => Promise<T>,
  context: ExecutionContext = {},
): Promise<T> {
  const { signal, timeout } = context;
  signal?.throwIfAborted();

  let pending = call();

  if (signal) {
    pending = raceAbort(pending, signal);
  }

  if (timeout !== undefined && timeout > 0) {
    pending = withTimeout(pending, timeout, `Query timed out after ${timeout}ms`);
  }

  return pending;
}

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
