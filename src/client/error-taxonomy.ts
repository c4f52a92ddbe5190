/**
 * Error Taxonomy
 *
 * Every failure the client can report is one of a closed set of kinds. The
 * kind (plus the HTTP status for `http`) alone decides whether the failure is
 * retried and what the user is told, so nothing downstream branches on raw
 * status codes or transport errors.
 */

export type ApiErrorKind =
  | "network"
  | "http"
  | "invalid_response"
  | "invalid_request"
  | "circuit_open"
  | "timeout"
  | "no_data"
  | "no_connectivity"
  | "backend_unavailable";

export const API_ERROR_KINDS: readonly ApiErrorKind[] = [
  "network",
  "http",
  "invalid_response",
  "invalid_request",
  "circuit_open",
  "timeout",
  "no_data",
  "no_connectivity",
  "backend_unavailable",
] as const;

/** Kinds that are never retried whatever the attempt count. */
const FAIL_FAST_KINDS: ReadonlySet<ApiErrorKind> = new Set([
  "invalid_response",
  "invalid_request",
  "circuit_open",
  "no_data",
  "no_connectivity",
  "backend_unavailable",
]);

const GENERIC_MESSAGE = "Something went wrong. Please try again.";

const KIND_MESSAGES: Record<Exclude<ApiErrorKind, "http">, string> = {
  network: "Connection problem. Please try again.",
  invalid_response: GENERIC_MESSAGE,
  invalid_request: "Couldn't process that. Please try again.",
  circuit_open: "AI isn't responding. Please try again.",
  timeout: "Taking too long. Please try again.",
  no_data: "No response. Please try again.",
  no_connectivity: "No internet connection. Check your network and keyboard access, then try again.",
  backend_unavailable: "AI isn't responding. Please try again.",
};

export type ApiErrorOptions = {
  /** Backend or transport detail, not shown to the user. */
  detail?: string;
  /** HTTP status, required for kind `http`. */
  statusCode?: number;
  /** Set when the caller aborted the request. */
  cancelled?: boolean;
  /** Set once the retry ladder has run out for this error. */
  exhaustedRetries?: number;
  cause?: unknown;
};

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly detail: string;
  readonly statusCode: number | undefined;
  readonly cancelled: boolean;
  readonly exhaustedRetries: number | undefined;

  constructor(kind: ApiErrorKind, options: ApiErrorOptions = {}) {
    super(describe(kind, options), { cause: options.cause });
    this.name = "ApiError";
    this.kind = kind;
    this.detail = options.detail ?? "";
    this.statusCode = options.statusCode;
    this.cancelled = options.cancelled ?? false;
    this.exhaustedRetries = options.exhaustedRetries;
  }

  get shouldRetry(): boolean {
    return isRetryable(this);
  }

  /** Short, user-safe text for the keyboard UI. */
  get userMessage(): string {
    const base =
      this.kind === "http" ? userFriendlyMessage(this.statusCode ?? 0) : KIND_MESSAGES[this.kind];
    if (this.exhaustedRetries === undefined) {
      return base;
    }
    return `${base} Retried ${this.exhaustedRetries} times without success.`;
  }
}

function describe(kind: ApiErrorKind, options: ApiErrorOptions): string {
  const detail = options.detail ? `: ${options.detail}` : "";
  const head = kind === "http" ? `HTTP ${options.statusCode ?? "?"}${detail}` : `${kind}${detail}`;
  if (options.exhaustedRetries === undefined) {
    return head;
  }
  return `${head} (retried ${options.exhaustedRetries} times)`;
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}

/**
 * Retry directive, derived only from kind, status and cancellation.
 *
 * - cancellation → never
 * - network, timeout → yes
 * - HTTP 5xx, 429 → yes; other statuses → no
 * - preflight and local failures → never
 */
export function isRetryable(error: ApiError): boolean {
  if (error.cancelled || FAIL_FAST_KINDS.has(error.kind)) {
    return false;
  }
  if (error.kind === "http") {
    const status = error.statusCode ?? 0;
    return status === 429 || (status >= 500 && status < 600);
  }
  return error.kind === "network" || error.kind === "timeout";
}

/**
 * User message for an HTTP status.
 */
export function userFriendlyMessage(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return "Couldn't process that. Please try again.";
    case 401:
      return "Authentication problem. Please try again.";
    case 403:
      return "Access denied. Please try again.";
    case 404:
      return "Couldn't find that. Please try again.";
    case 429:
      return "Too many requests. Please wait and try again.";
    case 500:
    case 502:
    case 503:
      return "AI isn't responding. Please try again.";
    case 504:
      return "Taking too long. Please try again.";
    default:
      return GENERIC_MESSAGE;
  }
}

export type TransportFailure = "cancelled" | "timeout" | "network";

/**
 * Map a failed fetch into the taxonomy.
 */
export function classifyTransportFailure(reason: TransportFailure, err?: unknown): ApiError {
  switch (reason) {
    case "cancelled":
      return new ApiError("network", { detail: "Request cancelled", cancelled: true, cause: err });
    case "timeout":
      return new ApiError("timeout", { detail: "Request timed out", cause: err });
    case "network":
      return new ApiError("network", { detail: getErrorMessage(err), cause: err });
  }
}

/**
 * Map a non-2xx response into the taxonomy.
 */
export function classifyHttpStatus(statusCode: number, detail = ""): ApiError {
  return new ApiError("http", { statusCode, detail });
}

/**
 * Copy of `error` marked as final after `retries` retries.
 */
export function withExhaustedRetries(error: ApiError, retries: number): ApiError {
  return new ApiError(error.kind, {
    detail: error.detail,
    statusCode: error.statusCode,
    cancelled: error.cancelled,
    exhaustedRetries: retries,
    cause: error.cause,
  });
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause;
    // undici wraps the socket error: "fetch failed" → cause "ECONNREFUSED ..."
    if (cause instanceof Error && err.message === "fetch failed") {
      return `${err.message}: ${cause.message}`;
    }
    return err.message;
  }
  if (typeof err === "string") return err;
  return "";
}
