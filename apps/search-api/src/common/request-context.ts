import { AsyncLocalStorage } from "node:async_hooks";

export const CORRELATION_ID_HEADER = "x-correlation-id";

export interface RequestContext {
  correlationId: string;
  /** Epoch ms when the request entered the middleware chain */
  startedAt: number;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

export function getCorrelationId(): string | undefined {
  return requestContext.getStore()?.correlationId;
}

/** Milliseconds since the current request started, if there is one */
export function getRequestElapsedMs(now = Date.now()): number | undefined {
  const context = requestContext.getStore();
  return context === undefined ? undefined : now - context.startedAt;
}
