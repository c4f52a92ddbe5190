import type { FetchLike } from "../client/http.js";

export type RecordedCall = {
  url: string;
  path: string;
  method: string;
  headers: Headers;
  body: unknown;
};

export type FakeHandler = (call: RecordedCall) => Response | Promise<Response>;

export type FakeBackend = {
  fetch: FetchLike;
  calls: RecordedCall[];
  callsTo: (path: string) => RecordedCall[];
};

/**
 * In-process stand-in for the backend and the connectivity host. The handler
 * may throw to simulate a transport failure, or return a promise that never
 * settles to simulate a hung connection.
 */
export function createFakeBackend(handler: FakeHandler): FakeBackend {
  const calls: RecordedCall[] = [];

  const fetch: FetchLike = async (url, init) => {
    const parsed = new URL(url);
    const call: RecordedCall = {
      url,
      path: parsed.pathname,
      method: init.method ?? "GET",
      headers: new Headers(init.headers),
      body: typeof init.body === "string" ? JSON.parse(init.body) : undefined,
    };
    calls.push(call);
    return handler(call);
  };

  return {
    fetch,
    calls,
    callsTo: (path) => calls.filter((c) => c.path === path),
  };
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

export function textResponse(status: number, body: string): Response {
  // The Response constructor rejects any body, even "", for null-body statuses.
  return new Response(NULL_BODY_STATUSES.has(status) && body === "" ? null : body, { status });
}

/** A promise whose settlement the test controls. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export const flushDelivery = () => new Promise<void>((resolve) => setTimeout(resolve, 0));
