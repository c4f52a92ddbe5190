import { describe, expect, it } from "vitest";
import { fetchWithTimeout, joinUrl, readBodyText } from "./http.js";

describe("fetchWithTimeout", () => {
  it("returns the response", async () => {
    const outcome = await fetchWithTimeout(async () => new Response("ok"), "https://backend.test/", {}, 1_000);
    expect(outcome.ok).toBe(true);
  });

  it("reports a timeout even if the fetch ignores its signal", async () => {
    const outcome = await fetchWithTimeout(() => new Promise<Response>(() => {}), "https://backend.test/", {}, 20);
    expect(outcome).toMatchObject({ ok: false, reason: "timeout" });
  });

  it("reports a caller abort as cancelled", async () => {
    const controller = new AbortController();
    const outcome = await fetchWithTimeout(
      () => {
        controller.abort();
        return new Promise<Response>(() => {});
      },
      "https://backend.test/",
      {},
      10_000,
      controller.signal,
    );
    expect(outcome).toMatchObject({ ok: false, reason: "cancelled" });
  });

  it("does not call fetch for an already aborted signal", async () => {
    let called = false;
    const outcome = await fetchWithTimeout(
      async () => {
        called = true;
        return new Response("");
      },
      "https://backend.test/",
      {},
      1_000,
      AbortSignal.abort(),
    );
    expect(outcome).toMatchObject({ ok: false, reason: "cancelled" });
    expect(called).toBe(false);
  });

  it("reports transport errors as network failures", async () => {
    const error = new TypeError("fetch failed");
    const outcome = await fetchWithTimeout(
      async () => {
        throw error;
      },
      "https://backend.test/",
      {},
      1_000,
    );
    expect(outcome).toEqual({ ok: false, reason: "network", error });
  });
});

describe("readBodyText", () => {
  it("reads an already consumed body as empty", async () => {
    const response = new Response("once");
    await response.text();
    expect(await readBodyText(response)).toBe("");
  });
});

describe("joinUrl", () => {
  it("joins with exactly one slash", () => {
    expect(joinUrl("https://backend.test/", "/api/chat")).toBe("https://backend.test/api/chat");
    expect(joinUrl("https://backend.test", "api/chat")).toBe("https://backend.test/api/chat");
  });
});
