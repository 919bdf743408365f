import { randomUUID } from 'crypto';

import { AsyncLocalStorage } from 'async_hooks';

/**
* Request Context Module
* Carries a correlation ID and the invoking tool name through a single tool call,
* including every concurrent per-property task it spawns.
*/

export interface RequestContext {
  requestId: string;
  /** Tool being executed (e.g. query_multiple_properties) */
  tool?: string | undefined;
  startTime: number;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
* Get current request context
* @returns Current request context or undefined if not in a context
*/
export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
* Run function within a request context
* @param context - Request context to use
* @param fn - Function to execute
* @returns Promise that resolves with the function result
*/
export function runWithContext<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
* Generate new request context
* @param options - Optional context properties to override defaults
*/
export function createRequestContext(options?: Partial<RequestContext>): RequestContext {
  return {
    requestId: options?.requestId || randomUUID(),
    tool: options?.tool,
    startTime: Date.now(),
  };
}

/**
* Get elapsed time since the current call started
* @returns Elapsed time in milliseconds, or 0 if no context
*/
export function getElapsedMs(): number {
  const context = getRequestContext();
  if (!context) return 0;
  return Date.now() - context.startTime;
}
