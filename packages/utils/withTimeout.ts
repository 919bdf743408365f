/**
* Timeout wrapper utilities for async operations
*/

/**
* Error thrown when an operation times out
*/
export class TimeoutError extends Error {
  constructor(message: string = 'Operation timed out', public readonly timeoutMs?: number) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export interface WithTimeoutOptions {
  /** Custom timeout error message */
  message?: string;
  /**
  * AbortController to abort when the timeout fires.
  * Pass the controller (not controller.signal) so it can be aborted here.
  */
  controller?: AbortController;
}

/**
* Wrap a promise with a timeout.
* The timer is always cleared once the promise settles.
*
* @param promise - The promise to wrap
* @param timeoutMs - Timeout in milliseconds
* @returns Promise that rejects with TimeoutError if the timeout is exceeded
*/
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  options: WithTimeoutOptions = {}
): Promise<T> {
  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      options.controller?.abort();
      reject(new TimeoutError(options.message || `Operation timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    promise
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}

/**
* Run an operation that accepts an AbortSignal, aborting it on timeout
*/
export function withAbortableTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  message?: string
): Promise<T> {
  const controller = new AbortController();
  return withTimeout(operation(controller.signal), timeoutMs, {
    controller,
    ...(message !== undefined && { message }),
  });
}
