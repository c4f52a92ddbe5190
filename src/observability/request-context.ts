/**
 * Request Context — Observability
 *
 * One logical rewrite/chat request keeps the same request id across its
 * retries; the id is sent upstream as `x-request-id` and stamped on every
 * telemetry event raised while the request runs.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import crypto from "node:crypto";

export type RequestOperation = "rewrite" | "chat";

export type RequestContext = {
  requestId: string;
  operation: RequestOperation;
  /** Attempt currently running (0-based). */
  attempt: number;
  startedAt: number;
};

const requestStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Generate a random request ID (16 hex chars = 64 bits).
 */
export function generateRequestId(): string {
  return crypto.randomBytes(8).toString("hex");
}

export function createRequestContext(
  operation: RequestOperation,
  opts?: { requestId?: string; attempt?: number; startedAt?: number },
): RequestContext {
  return {
    requestId: opts?.requestId ?? generateRequestId(),
    operation,
    attempt: opts?.attempt ?? 0,
    startedAt: opts?.startedAt ?? Date.now(),
  };
}

/**
 * Run `fn` with `ctx` as the current request context.
 */
export function withRequestContext<T>(ctx: RequestContext, fn: () => T): T {
  return requestStorage.run(ctx, fn);
}

export function currentRequestContext(): RequestContext | undefined {
  return requestStorage.getStore();
}

export function currentRequestId(): string | undefined {
  return requestStorage.getStore()?.requestId;
}

/**
 * Milliseconds since the logical request started.
 */
export function elapsed(ctx: RequestContext, now: number = Date.now()): number {
  return now - ctx.startedAt;
}
