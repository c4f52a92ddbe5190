import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createSubsystemLogger, parseLogLevel, setLogLevel, setLogSink } from "./subsystem.js";

describe("parseLogLevel", () => {
  it("normalizes known levels", () => {
    expect(parseLogLevel(" WARN ")).toBe("warn");
  });

  it("falls back for unknown or missing levels", () => {
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined, "error")).toBe("error");
  });
});

describe("createSubsystemLogger", () => {
  let lines: string[];
  let restoreSink: () => void;
  let restoreLevel: () => void;

  beforeEach(() => {
    lines = [];
    restoreLevel = setLogLevel("info");
    restoreSink = setLogSink((line, meta) => {
      lines.push(meta ? `${line} ${JSON.stringify(meta)}` : line);
    });
  });

  afterEach(() => {
    restoreSink();
    restoreLevel();
  });

  it("prefixes level and subsystem", () => {
    const log = createSubsystemLogger("breaker");
    log.info("Circuit closed");
    log.warn("Circuit open", { consecutiveFailures: 3 });
    expect(lines).toEqual([
      "[info][breaker] Circuit closed",
      '[warn][breaker] Circuit open {"consecutiveFailures":3}',
    ]);
  });

  it("drops lines below the active level", () => {
    setLogLevel("warn");
    const log = createSubsystemLogger("preflight");
    log.debug("noise");
    log.info("noise");
    log.error("Health check failed");
    expect(lines).toEqual(["[error][preflight] Health check failed"]);
  });
});
