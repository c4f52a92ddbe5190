/**
 * Circuit Breaker
 *
 * Tracks backend health across requests:
 *
 *   closed ──(failureThreshold consecutive failures)──▶ open(until)
 *   open ──(queried at now ≥ until)──▶ half_open(until = now + halfOpenTimeout)
 *   half_open ──(success)──▶ closed
 *   half_open ──(probe failure | window lapses)──▶ open(fresh cooldown)
 *
 * Every transition happens inside a single synchronous method, so callers
 * interleaving on the event loop always observe one consistent state.
 */

import { createSubsystemLogger } from "../logging/subsystem.js";
import { emitTelemetry } from "../observability/telemetry.js";

const log = createSubsystemLogger("breaker");

export type CircuitState =
  | { status: "closed" }
  | { status: "open"; until: number }
  | { status: "half_open"; until: number };

export type CircuitSnapshot = {
  state: CircuitState;
  consecutiveFailures: number;
  probeInFlight: boolean;
};

export type CircuitBreakerOptions = {
  failureThreshold?: number;
  cooldownMs?: number;
  halfOpenTimeoutMs?: number;
  now?: () => number;
};

export class CircuitBreaker {
  readonly failureThreshold: number;
  readonly cooldownMs: number;
  readonly halfOpenTimeoutMs: number;

  private readonly now: () => number;
  private state: CircuitState = { status: "closed" };
  private consecutiveFailures = 0;
  private probeInFlight = false;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 3;
    this.cooldownMs = options.cooldownMs ?? 8_000;
    this.halfOpenTimeoutMs = options.halfOpenTimeoutMs ?? 5_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Current state, after applying any transition the clock has made due.
   */
  currentState(): CircuitState {
    const now = this.now();

    if (this.state.status === "open" && now >= this.state.until) {
      this.transition({ status: "half_open", until: now + this.halfOpenTimeoutMs }, "cooldown elapsed");
    } else if (this.state.status === "half_open" && now >= this.state.until) {
      this.transition({ status: "open", until: now + this.cooldownMs }, "half-open window lapsed");
    }

    return this.state;
  }

  /**
   * Claim the single half-open trial slot. False when the breaker is not
   * half-open or another request already holds the slot.
   */
  tryAcquireProbe(): boolean {
    if (this.currentState().status !== "half_open" || this.probeInFlight) {
      return false;
    }
    this.probeInFlight = true;
    return true;
  }

  /**
   * Give the half-open slot back without a verdict (the trial was cancelled).
   */
  releaseProbe(): void {
    this.probeInFlight = false;
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state.status !== "closed") {
      this.transition({ status: "closed" }, "success recorded");
    }
  }

  recordFailure(): void {
    this.consecutiveFailures += 1;
    const state = this.currentState();

    if (state.status === "half_open") {
      this.transition({ status: "open", until: this.now() + this.cooldownMs }, "trial request failed");
      return;
    }

    if (state.status === "closed" && this.consecutiveFailures >= this.failureThreshold) {
      this.transition(
        { status: "open", until: this.now() + this.cooldownMs },
        `${this.consecutiveFailures} consecutive failures`,
      );
    }
  }

  /**
   * A backend health probe failed. Re-opens a half-open breaker with a fresh
   * cooldown; an open breaker stays open until its current deadline.
   */
  recordProbeFailure(): void {
    if (this.currentState().status === "half_open") {
      this.transition({ status: "open", until: this.now() + this.cooldownMs }, "health probe failed");
    }
  }

  reset(): void {
    this.consecutiveFailures = 0;
    if (this.state.status !== "closed") {
      this.transition({ status: "closed" }, "reset");
    }
  }

  snapshot(): CircuitSnapshot {
    return {
      state: this.currentState(),
      consecutiveFailures: this.consecutiveFailures,
      probeInFlight: this.probeInFlight,
    };
  }

  private transition(next: CircuitState, reason: string): void {
    const from = this.state.status;
    this.state = next;
    // the trial slot belongs to one half-open window; a trial that outlives it holds nothing
    if (next.status !== "half_open") {
      this.probeInFlight = false;
    }
    const until = next.status === "closed" ? "" : ` until ${new Date(next.until).toISOString()}`;
    const message = `Circuit ${from} → ${next.status}${until} (${reason})`;
    if (next.status === "open") {
      log.warn(message, { consecutiveFailures: this.consecutiveFailures });
    } else {
      log.info(message);
    }
    emitTelemetry({
      type: "breaker",
      success: next.status === "closed",
      meta: { from, to: next.status, reason, consecutiveFailures: this.consecutiveFailures },
    });
  }
}

export function formatCircuitState(state: CircuitState, now: number = Date.now()): string {
  if (state.status === "closed") {
    return "closed";
  }
  const remaining = Math.max(0, Math.ceil((state.until - now) / 1000));
  return `${state.status} (${remaining}s remaining)`;
}
