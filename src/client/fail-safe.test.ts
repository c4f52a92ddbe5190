import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { armFailSafe } from "./fail-safe.js";

describe("armFailSafe", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("fires once at the ceiling", () => {
    const onExpire = vi.fn();
    const handle = armFailSafe({ ceilingMs: 60_000, onExpire });

    vi.advanceTimersByTime(59_999);
    expect(onExpire).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onExpire).toHaveBeenCalledTimes(1);
    expect(handle.fired).toBe(true);
  });

  it("does nothing once disarmed", () => {
    const onExpire = vi.fn();
    const handle = armFailSafe({ ceilingMs: 1_000, onExpire });

    handle.disarm();
    vi.advanceTimersByTime(5_000);
    expect(onExpire).not.toHaveBeenCalled();
    expect(handle.fired).toBe(false);
  });
});
