/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID, batch ID and current document through API
 * requests, worker jobs and batch extraction using AsyncLocalStorage.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  batchId?: string;
  documentId?: string;
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
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run a function in a child of the current context with the document set.
 * Used by the batch pool so every log line of one extraction names its document.
 */
export function runForDocument<T>(documentId: string, fn: () => T): T {
  const parent = getContext();
  return asyncLocalStorage.run(
    {
      correlationId: parent?.correlationId || ulid(),
      batchId: parent?.batchId,
      documentId,
    },
    fn
  );
}

export { asyncLocalStorage };
