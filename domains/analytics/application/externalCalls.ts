import { ErrorCodes, ExternalApiError } from '@errors';
import { TimeoutError, withAbortableTimeout } from '@utils/withTimeout';

/**
* Run one GA API call under the configured timeout.
* A timeout surfaces as ExternalApiError(TIMEOUT_ERROR); other errors pass through.
*/
export async function callExternal<T>(
  operation: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  try {
    return await withAbortableTimeout(call, timeoutMs, `${operation} timed out after ${timeoutMs}ms`);
  } catch (error) {
    if (error instanceof TimeoutError) {
      throw new ExternalApiError(error.message, ErrorCodes.TIMEOUT_ERROR, { timeoutMs }, { cause: error });
    }
    throw error;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
