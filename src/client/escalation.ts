/**
 * Escalation
 *
 * When a request ends in failure, produce one structured record with
 * enough context (operation, attempts, status, latency) to diagnose a
 * recurring backend problem from the logs alone.
 */

import { elapsed, type RequestContext, type RequestOperation } from "../observability/request-context.js";
import type { ApiError, ApiErrorKind } from "./error-taxonomy.js";

export type EscalationInfo = {
  kind: ApiErrorKind;
  operation: RequestOperation;
  requestId: string;
  /** Attempts made, including the first. */
  attempts: number;
  /** Total latency in ms from first attempt to escalation. */
  latencyMs: number;
  retryable: boolean;
  errorMessage: string;
  /** HTTP status code if available. */
  httpStatus?: number;
  /** ISO timestamp of escalation. */
  escalatedAt: string;
};

export function escalate(
  error: ApiError,
  ctx: RequestContext,
  now: number = Date.now(),
): EscalationInfo {
  return {
    kind: error.kind,
    operation: ctx.operation,
    requestId: ctx.requestId,
    attempts: ctx.attempt + 1,
    latencyMs: elapsed(ctx, now),
    retryable: error.shouldRetry,
    errorMessage: error.message,
    httpStatus: error.statusCode,
    escalatedAt: new Date(now).toISOString(),
  };
}

/**
 * Format escalation info as a single log line.
 */
export function formatEscalation(info: EscalationInfo): string {
  const parts = [
    `[ESCALATION]`,
    `op=${info.operation}`,
    `kind=${info.kind}`,
    `request=${info.requestId}`,
    `attempts=${info.attempts}`,
    `latency=${info.latencyMs}ms`,
  ];
  if (info.httpStatus !== undefined) parts.push(`http=${info.httpStatus}`);
  if (info.retryable) parts.push("retryable");
  parts.push(`msg="${info.errorMessage}"`);
  return parts.join(" ");
}
