import { describe, expect, it } from "vitest";
import { chatRequestKey, RequestDeduplicator, rewriteRequestKey } from "./request-dedup.js";

describe("RequestDeduplicator", () => {
  function create() {
    const clock = { now: 0 };
    const dedup = new RequestDeduplicator({ now: () => clock.now });
    return { clock, dedup };
  }

  it("flags a repeat within the window", () => {
    const { clock, dedup } = create();
    expect(dedup.isDuplicate("k")).toBe(false);
    clock.now = 2_000;
    expect(dedup.isDuplicate("k")).toBe(true);
  });

  it("lets a repeat through once the window has passed", () => {
    const { clock, dedup } = create();
    dedup.isDuplicate("k");
    clock.now = 6_000;
    expect(dedup.isDuplicate("k")).toBe(false);
  });

  it("measures the window from the first accepted request", () => {
    const { clock, dedup } = create();
    dedup.isDuplicate("k");
    clock.now = 4_999;
    expect(dedup.isDuplicate("k")).toBe(true);
    clock.now = 5_000;
    expect(dedup.isDuplicate("k")).toBe(false);
    clock.now = 9_999;
    expect(dedup.isDuplicate("k")).toBe(true);
  });

  it("keeps distinct keys apart", () => {
    const { dedup } = create();
    expect(dedup.isDuplicate("a")).toBe(false);
    expect(dedup.isDuplicate("b")).toBe(false);
    expect(dedup.size()).toBe(2);
  });

  it("purges records older than the retention window", () => {
    const { clock, dedup } = create();
    dedup.isDuplicate("old");
    clock.now = 300_000;
    dedup.isDuplicate("new");
    expect(dedup.size()).toBe(1);
  });

  it("clear forgets everything", () => {
    const { dedup } = create();
    dedup.isDuplicate("k");
    dedup.clear();
    expect(dedup.isDuplicate("k")).toBe(false);
  });
});

describe("request keys", () => {
  const base = { text: "Hello world", tone: 0.5, length: 0.5 };

  it("are 16 hex characters", () => {
    expect(rewriteRequestKey(base)).toMatch(/^[0-9a-f]{16}$/);
    expect(chatRequestKey({ query: "hi" })).toMatch(/^[0-9a-f]{16}$/);
  });

  it("ignore surrounding whitespace", () => {
    expect(rewriteRequestKey({ ...base, text: "  Hello world\n" })).toBe(rewriteRequestKey(base));
  });

  it("only look at the first 50 characters of rewrite text", () => {
    const prefix = "x".repeat(50);
    expect(rewriteRequestKey({ ...base, text: `${prefix}a` })).toBe(rewriteRequestKey({ ...base, text: `${prefix}b` }));
  });

  it("only look at the first 100 characters of a chat query", () => {
    const prefix = "q".repeat(100);
    expect(chatRequestKey({ query: `${prefix}1` })).toBe(chatRequestKey({ query: `${prefix}2` }));
    expect(chatRequestKey({ query: "q".repeat(99) + "1" })).not.toBe(chatRequestKey({ query: "q".repeat(99) + "2" }));
  });

  it("distinguish tone and length", () => {
    expect(rewriteRequestKey({ ...base, tone: 0.6 })).not.toBe(rewriteRequestKey(base));
    expect(rewriteRequestKey({ ...base, length: 0.1 })).not.toBe(rewriteRequestKey(base));
  });

  it("ignore preset and locale", () => {
    expect(rewriteRequestKey({ ...base, presetId: "email", locale: "en-US" })).toBe(rewriteRequestKey(base));
  });

  it("never collide between rewrite and chat", () => {
    expect(chatRequestKey({ query: "Hello world" })).not.toBe(rewriteRequestKey(base));
  });
});
