/**
 * Telemetry — Observability
 *
 * Per-event telemetry for the client: each HTTP attempt, scheduled retry,
 * breaker transition, preflight probe, suppressed duplicate and escalation.
 * Events are logged and fanned out to in-process listeners.
 */

import { createSubsystemLogger } from "../logging/subsystem.js";
import { currentRequestContext, type RequestOperation } from "./request-context.js";

const log = createSubsystemLogger("telemetry");

export type TelemetryEvent = {
  /** Event type */
  type: "attempt" | "retry" | "breaker" | "probe" | "dedup" | "escalation";
  /** Whether the step succeeded */
  success: boolean;
  operation?: RequestOperation;
  /** 0-based attempt the event belongs to */
  attempt?: number;
  /** HTTP status, when a response was received */
  status?: number;
  latencyMs?: number;
  errorKind?: string;
  errorMessage?: string;
  /** Request ID for correlation */
  requestId?: string;
  meta?: Record<string, unknown>;
};

type TelemetryListener = (event: TelemetryEvent) => void;

const listeners: TelemetryListener[] = [];

/**
 * Emit a telemetry event, filling operation/attempt/requestId from the
 * current request context when the caller left them out.
 */
export function emitTelemetry(event: TelemetryEvent): void {
  const ctx = currentRequestContext();
  const enriched: TelemetryEvent = {
    ...event,
    operation: event.operation ?? ctx?.operation,
    attempt: event.attempt ?? ctx?.attempt,
    requestId: event.requestId ?? ctx?.requestId,
  };

  const level = enriched.success ? "debug" : "warn";
  log[level](
    `${enriched.type}: ${enriched.operation ?? "-"}#${enriched.attempt ?? "-"} ${enriched.success ? "ok" : "FAIL"}${enriched.status ? ` status=${enriched.status}` : ""}${enriched.latencyMs !== undefined ? ` ${enriched.latencyMs}ms` : ""}`,
    { ...enriched },
  );

  for (const listener of listeners) {
    try {
      listener(enriched);
    } catch (err) {
      log.error(`Telemetry listener failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

/**
 * Register a telemetry listener. Returns unsubscribe function.
 */
export function onTelemetry(fn: TelemetryListener): () => void {
  listeners.push(fn);
  return () => {
    const idx = listeners.indexOf(fn);
    if (idx >= 0) listeners.splice(idx, 1);
  };
}

/**
 * Clear all listeners (for testing).
 */
export function clearTelemetryListeners(): void {
  listeners.length = 0;
}
