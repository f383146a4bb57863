/**
 * AsyncLocalStorage Context Management
 *
 * Propagates correlation IDs and the document being converted across API
 * requests, worker jobs and pipeline stages.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';
import type { SourceFormat } from './types';

export interface RequestContext {
  correlationId: string;
  documentId?: string;
  sourceFormat?: SourceFormat;
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

export { asyncLocalStorage };
