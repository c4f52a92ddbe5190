/**
 * Bounded fetch: one timeout per call, linked to an optional caller signal.
 * Never throws; the outcome says whether a response arrived and, if not,
 * whether the caller, the timer or the transport ended it.
 */

import { createSubsystemLogger } from "../logging/subsystem.js";
import { currentRequestId } from "../observability/request-context.js";
import { getErrorMessage, type TransportFailure } from "./error-taxonomy.js";

const log = createSubsystemLogger("http");

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type FetchOutcome =
  | { ok: true; response: Response }
  | { ok: false; reason: TransportFailure; error: unknown };

export async function fetchWithTimeout(
  fetchFn: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<FetchOutcome> {
  if (signal?.aborted) {
    return { ok: false, reason: "cancelled", error: signal.reason };
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  const onCallerAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const response = await raceAbort(fetchFn(url, { ...init, signal: controller.signal }), controller.signal);
    return { ok: true, response };
  } catch (err) {
    if (timedOut) {
      return { ok: false, reason: "timeout", error: err };
    }
    if (signal?.aborted) {
      return { ok: false, reason: "cancelled", error: err };
    }
    return { ok: false, reason: "network", error: err };
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onCallerAbort);
  }
}

/**
 * Reject as soon as `signal` aborts, even if the underlying fetch ignores it.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Read a body as text; a body that fails mid-stream reads as empty.
 */
export async function readBodyText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    log.warn(`Failed to read response body: ${getErrorMessage(err)}`, {
      status: response.status,
      requestId: currentRequestId(),
    });
    return "";
  }
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}
