import { beforeEach, describe, expect, it } from "vitest";
import { clearTelemetryListeners, onTelemetry, type TelemetryEvent } from "../observability/telemetry.js";
import { CircuitBreaker, formatCircuitState } from "./circuit-breaker.js";

describe("CircuitBreaker", () => {
  let now: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    now = 50_000;
    breaker = new CircuitBreaker({ now: () => now });
  });

  const fail = (times: number) => {
    for (let i = 0; i < times; i++) breaker.recordFailure();
  };

  it("stays closed below the failure threshold", () => {
    fail(2);
    expect(breaker.snapshot()).toEqual({
      state: { status: "closed" },
      consecutiveFailures: 2,
      probeInFlight: false,
    });
  });

  it("opens on the third consecutive failure", () => {
    fail(3);
    expect(breaker.currentState()).toEqual({ status: "open", until: 58_000 });
  });

  it("only counts consecutive failures", () => {
    fail(2);
    breaker.recordSuccess();
    fail(2);
    expect(breaker.currentState()).toEqual({ status: "closed" });
  });

  it("goes half-open once the cooldown has elapsed", () => {
    fail(3);
    now = 57_999;
    expect(breaker.currentState().status).toBe("open");
    now = 58_000;
    expect(breaker.currentState()).toEqual({ status: "half_open", until: 63_000 });
  });

  it("re-opens with a fresh cooldown when the half-open window lapses", () => {
    fail(3);
    now = 58_000;
    breaker.currentState();
    now = 63_000;
    expect(breaker.currentState()).toEqual({ status: "open", until: 71_000 });
  });

  it("hands out the half-open trial slot once", () => {
    fail(3);
    now = 58_000;
    expect(breaker.tryAcquireProbe()).toBe(true);
    expect(breaker.tryAcquireProbe()).toBe(false);
    breaker.releaseProbe();
    expect(breaker.tryAcquireProbe()).toBe(true);
  });

  it("never hands out a trial slot while closed or open", () => {
    expect(breaker.tryAcquireProbe()).toBe(false);
    fail(3);
    expect(breaker.tryAcquireProbe()).toBe(false);
  });

  it("closes when the half-open trial succeeds", () => {
    fail(3);
    now = 58_000;
    breaker.tryAcquireProbe();
    breaker.recordSuccess();
    expect(breaker.snapshot()).toEqual({
      state: { status: "closed" },
      consecutiveFailures: 0,
      probeInFlight: false,
    });
  });

  it("re-opens when the half-open trial fails", () => {
    fail(3);
    now = 59_000;
    breaker.tryAcquireProbe();
    breaker.recordFailure();
    expect(breaker.snapshot()).toEqual({
      state: { status: "open", until: 67_000 },
      consecutiveFailures: 4,
      probeInFlight: false,
    });
  });

  it("frees the trial slot when the half-open window lapses mid-trial", () => {
    fail(3);
    now = 58_000;
    expect(breaker.tryAcquireProbe()).toBe(true);

    now = 64_000;
    expect(breaker.currentState()).toEqual({ status: "open", until: 72_000 });
    breaker.recordFailure();
    expect(breaker.snapshot()).toEqual({
      state: { status: "open", until: 72_000 },
      consecutiveFailures: 4,
      probeInFlight: false,
    });

    now = 72_000;
    expect(breaker.tryAcquireProbe()).toBe(true);
  });

  it("re-opens a half-open breaker on a failed health probe", () => {
    fail(3);
    now = 60_000;
    breaker.currentState();
    breaker.recordProbeFailure();
    expect(breaker.currentState()).toEqual({ status: "open", until: 68_000 });
  });

  it("keeps an open breaker's deadline on a failed health probe", () => {
    fail(3);
    now = 55_000;
    breaker.recordProbeFailure();
    expect(breaker.currentState()).toEqual({ status: "open", until: 58_000 });
  });

  it("reset closes from any state", () => {
    fail(3);
    breaker.reset();
    expect(breaker.snapshot()).toEqual({
      state: { status: "closed" },
      consecutiveFailures: 0,
      probeInFlight: false,
    });
  });

  it("honours custom thresholds and windows", () => {
    const custom = new CircuitBreaker({
      failureThreshold: 1,
      cooldownMs: 30_000,
      halfOpenTimeoutMs: 10_000,
      now: () => now,
    });
    custom.recordFailure();
    expect(custom.currentState()).toEqual({ status: "open", until: 80_000 });
    now = 80_000;
    expect(custom.currentState()).toEqual({ status: "half_open", until: 90_000 });
  });

  it("emits a breaker telemetry event per transition", () => {
    const events: TelemetryEvent[] = [];
    const off = onTelemetry((e) => events.push(e));
    try {
      fail(3);
      breaker.reset();
    } finally {
      off();
      clearTelemetryListeners();
    }
    expect(events.map((e) => [e.type, e.meta?.from, e.meta?.to])).toEqual([
      ["breaker", "closed", "open"],
      ["breaker", "open", "closed"],
    ]);
  });
});

describe("formatCircuitState", () => {
  it("formats closed", () => {
    expect(formatCircuitState({ status: "closed" }, 0)).toBe("closed");
  });

  it("rounds the remaining time up to whole seconds", () => {
    expect(formatCircuitState({ status: "open", until: 8_000 }, 500)).toBe("open (8s remaining)");
    expect(formatCircuitState({ status: "half_open", until: 5_000 }, 0)).toBe("half_open (5s remaining)");
  });
});
