/**
 * Preflight probes.
 *
 * Two cheap checks with their own short timeouts, kept apart because they
 * answer different questions: "is there a network at all?" (external host)
 * and "is our backend up?" (its /api/health endpoint).
 */

import { createSubsystemLogger } from "../logging/subsystem.js";
import { emitTelemetry } from "../observability/telemetry.js";
import { getErrorMessage } from "./error-taxonomy.js";
import { fetchWithTimeout, joinUrl, type FetchLike } from "./http.js";

const log = createSubsystemLogger("preflight");

export const HEALTH_PATH = "/api/health";

export type PreflightOptions = {
  fetch: FetchLike;
  baseUrl: string;
  connectivityUrl: string;
  connectivityTimeoutMs: number;
  healthTimeoutMs: number;
};

export class Preflight {
  private readonly options: PreflightOptions;
  private healthInFlight: Promise<boolean> | null = null;

  constructor(options: PreflightOptions) {
    this.options = options;
  }

  /**
   * HEAD the well-known external host. Any 2xx counts as connected.
   */
  async checkConnectivity(signal?: AbortSignal): Promise<boolean> {
    const started = Date.now();
    const outcome = await fetchWithTimeout(
      this.options.fetch,
      this.options.connectivityUrl,
      { method: "HEAD" },
      this.options.connectivityTimeoutMs,
      signal,
    );
    const reachable = outcome.ok && outcome.response.ok;
    if (!reachable) {
      log.warn(
        outcome.ok
          ? `Connectivity probe got status ${outcome.response.status}`
          : `Connectivity probe failed (${outcome.reason}): ${getErrorMessage(outcome.error)}`,
      );
    }
    emitTelemetry({
      type: "probe",
      success: reachable,
      status: outcome.ok ? outcome.response.status : undefined,
      latencyMs: Date.now() - started,
      meta: { probe: "connectivity" },
    });
    return reachable;
  }

  /**
   * GET the backend health endpoint; healthy iff 200, body ignored.
   * Concurrent callers share the probe already in flight.
   */
  checkBackendHealth(): Promise<boolean> {
    if (!this.healthInFlight) {
      this.healthInFlight = this.probeHealth().finally(() => {
        this.healthInFlight = null;
      });
    }
    return this.healthInFlight;
  }

  private async probeHealth(): Promise<boolean> {
    const started = Date.now();
    const outcome = await fetchWithTimeout(
      this.options.fetch,
      joinUrl(this.options.baseUrl, HEALTH_PATH),
      { method: "GET" },
      this.options.healthTimeoutMs,
    );
    const healthy = outcome.ok && outcome.response.status === 200;
    if (!healthy) {
      log.warn(
        outcome.ok
          ? `Health check non-200 status: ${outcome.response.status}`
          : `Health check failed (${outcome.reason}): ${getErrorMessage(outcome.error)}`,
      );
    }
    emitTelemetry({
      type: "probe",
      success: healthy,
      status: outcome.ok ? outcome.response.status : undefined,
      latencyMs: Date.now() - started,
      meta: { probe: "health" },
    });
    return healthy;
  }
}
