/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID of a form-processing request through retrieval,
 * ranking and validation so every log line of that request can be joined.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  requestId?: string;
  domain?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Create a context for a new request. The request ID doubles as the
 * correlation ID unless the caller already has one.
 */
export function createRequestContext(
  domain: string,
  correlationId?: string
): RequestContext & { requestId: string } {
  const requestId = ulid();
  return {
    correlationId: correlationId || requestId,
    requestId,
    domain,
  };
}

export { asyncLocalStorage };
