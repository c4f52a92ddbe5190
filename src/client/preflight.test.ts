import { describe, expect, it } from "vitest";
import { createFakeBackend, deferred, textResponse, type FakeHandler } from "../test-utils/fake-backend.js";
import { HEALTH_PATH, Preflight } from "./preflight.js";

function setup(handler: FakeHandler) {
  const backend = createFakeBackend(handler);
  const preflight = new Preflight({
    fetch: backend.fetch,
    baseUrl: "https://backend.test/",
    connectivityUrl: "https://connectivity.test/",
    connectivityTimeoutMs: 100,
    healthTimeoutMs: 100,
  });
  return { backend, preflight };
}

describe("checkConnectivity", () => {
  it("sends a HEAD to the connectivity host", async () => {
    const { backend, preflight } = setup(() => textResponse(204, ""));
    expect(await preflight.checkConnectivity()).toBe(true);
    expect(backend.calls.map((c) => `${c.method} ${c.url}`)).toEqual(["HEAD https://connectivity.test/"]);
  });

  it("is false for a non-2xx status", async () => {
    const { preflight } = setup(() => textResponse(503, ""));
    expect(await preflight.checkConnectivity()).toBe(false);
  });

  it("is false when the transport fails", async () => {
    const { preflight } = setup(() => {
      throw new TypeError("fetch failed");
    });
    expect(await preflight.checkConnectivity()).toBe(false);
  });

  it("is false when the host does not answer in time", async () => {
    const { preflight } = setup(() => new Promise<Response>(() => {}));
    expect(await preflight.checkConnectivity()).toBe(false);
  });
});

describe("checkBackendHealth", () => {
  it("GETs the health endpoint and needs exactly 200", async () => {
    const { backend, preflight } = setup(() => textResponse(200, "anything"));
    expect(await preflight.checkBackendHealth()).toBe(true);
    expect(backend.calls.map((c) => `${c.method} ${c.path}`)).toEqual([`GET ${HEALTH_PATH}`]);
    expect(backend.calls[0].url).toBe("https://backend.test/api/health");
  });

  it("treats other 2xx statuses as unhealthy", async () => {
    const { preflight } = setup(() => textResponse(204, ""));
    expect(await preflight.checkBackendHealth()).toBe(false);
  });

  it("shares one probe between concurrent callers", async () => {
    const reply = deferred<Response>();
    const { backend, preflight } = setup(() => reply.promise);
    const first = preflight.checkBackendHealth();
    const second = preflight.checkBackendHealth();
    reply.resolve(textResponse(200, ""));
    expect(await Promise.all([first, second])).toEqual([true, true]);
    expect(backend.calls).toHaveLength(1);
  });

  it("probes again once the previous probe has finished", async () => {
    const { backend, preflight } = setup(() => textResponse(200, ""));
    await preflight.checkBackendHealth();
    await preflight.checkBackendHealth();
    expect(backend.calls).toHaveLength(2);
  });

  it("is false on timeout", async () => {
    const { preflight } = setup(() => new Promise<Response>(() => {}));
    expect(await preflight.checkBackendHealth()).toBe(false);
  });
});
