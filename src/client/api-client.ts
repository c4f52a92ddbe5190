/**
 * API Client — request executor
 *
 * Runs one logical rewrite/chat request through the resilience layer:
 *
 *   validate → dedup → fail-safe → connectivity preflight
 *     → breaker gate → HTTP attempt → classify
 *     → retry after backoff (back to the breaker gate) | finalize
 *
 * Failures never escape as exceptions: every request that is not suppressed
 * as a duplicate ends in exactly one ApiResult, delivered on the client's
 * DeliveryContext.
 */

import type { z } from "zod";
import { resolveClientConfig, type ClientConfig, type ClientConfigInput } from "../config/client-config.js";
import { noCredentials, type CredentialStore } from "../credentials/credential-store.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import {
  createRequestContext,
  withRequestContext,
  type RequestContext,
  type RequestOperation,
} from "../observability/request-context.js";
import { emitTelemetry } from "../observability/telemetry.js";
import { CircuitBreaker } from "./circuit-breaker.js";
import {
  ChatParamsSchema,
  CompletionBodySchema,
  ErrorBodySchema,
  RewriteParamsSchema,
  validateOrLog,
  type ChatParams,
  type RewriteParams,
} from "./contracts/schema-validators.js";
import { createSerialDelivery, type DeliveryContext } from "./delivery.js";
import {
  ApiError,
  classifyHttpStatus,
  classifyTransportFailure,
  getErrorMessage,
  withExhaustedRetries,
} from "./error-taxonomy.js";
import { escalate, formatEscalation } from "./escalation.js";
import { armFailSafe, type FailSafeHandle } from "./fail-safe.js";
import { fetchWithTimeout, joinUrl, readBodyText, type FetchLike } from "./http.js";
import { Preflight } from "./preflight.js";
import { chatRequestKey, RequestDeduplicator, rewriteRequestKey } from "./request-dedup.js";
import { RetryScheduler, sleep as defaultSleep, type Sleep } from "./retry-policy.js";

const log = createSubsystemLogger("api-client");

export const DUPLICATE_REQUEST_MESSAGE = "Request already in progress...";

export type ApiResult = { ok: true; text: string } | { ok: false; error: ApiError };

export type Operation = RequestOperation;

export type OperationParams = {
  rewrite: RewriteParams;
  chat: ChatParams;
};

export type ExecuteHandlers = {
  onComplete: (result: ApiResult) => void;
  /** Informational only; retries are silent. */
  onProgress?: (message: string) => void;
  /** The request was suppressed as a duplicate; onComplete will not fire. */
  onDuplicate?: () => void;
  signal?: AbortSignal;
};

export type RequestOptions = {
  signal?: AbortSignal;
  onProgress?: (message: string) => void;
};

export type ApiClientOptions = {
  config?: ClientConfigInput;
  fetch?: FetchLike;
  credentials?: CredentialStore;
  delivery?: DeliveryContext;
  /** Clock shared by the breaker and the deduplicator. */
  now?: () => number;
  /** Jitter source in [0, 1). */
  random?: () => number;
  sleep?: Sleep;
};

type OperationSpec<P> = {
  path: string;
  schema: z.ZodType<P, z.ZodTypeDef, unknown>;
  dedupKey: (params: P) => string;
  body: (params: P, config: ClientConfig) => Record<string, unknown>;
  /** Loggable summary; never includes the user's text. */
  describe: (params: P) => Record<string, unknown>;
};

const OPERATIONS: { [Op in Operation]: OperationSpec<OperationParams[Op]> } = {
  rewrite: {
    path: "/api/rewrite",
    schema: RewriteParamsSchema,
    dedupKey: rewriteRequestKey,
    body: (params, config) => ({
      text: params.text,
      tone: params.tone,
      length: params.length,
      locale: params.locale ?? config.defaultLocale,
      ...(params.presetId ? { preset: params.presetId } : {}),
    }),
    describe: (params) => ({
      tone: params.tone,
      length: params.length,
      textLength: params.text.length,
      preset: params.presetId,
    }),
  },
  chat: {
    path: "/api/chat",
    schema: ChatParamsSchema,
    dedupKey: chatRequestKey,
    body: (params) => ({ query: params.query }),
    describe: (params) => ({ queryLength: params.query.length }),
  },
};

type BreakerGate = { pass: true; holdsProbe: boolean } | { pass: false; error: ApiError };

const fail = (error: ApiError): ApiResult => ({ ok: false, error });

export class ApiClient {
  readonly config: ClientConfig;
  readonly breaker: CircuitBreaker;
  readonly dedup: RequestDeduplicator;
  readonly retry: RetryScheduler;
  readonly preflight: Preflight;

  private readonly fetchFn: FetchLike;
  private readonly credentials: CredentialStore;
  private readonly delivery: DeliveryContext;
  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(options: ApiClientOptions = {}) {
    this.config = resolveClientConfig(options.config);
    this.now = options.now ?? Date.now;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.credentials = options.credentials ?? noCredentials;
    this.delivery = options.delivery ?? createSerialDelivery();
    this.sleep = options.sleep ?? defaultSleep;

    this.breaker = new CircuitBreaker({
      failureThreshold: this.config.failureThreshold,
      cooldownMs: this.config.cooldownMs,
      halfOpenTimeoutMs: this.config.halfOpenTimeoutMs,
      now: this.now,
    });
    this.dedup = new RequestDeduplicator({
      windowMs: this.config.dedupWindowMs,
      retentionMs: this.config.dedupRetentionMs,
      now: this.now,
    });
    this.retry = new RetryScheduler({
      maxRetries: this.config.maxRetries,
      baseDelayMs: this.config.baseRetryDelayMs,
      jitterRange: this.config.jitterRange,
      minDelayMs: this.config.minRetryDelayMs,
      random: options.random,
    });
    this.preflight = new Preflight({
      fetch: this.fetchFn,
      baseUrl: this.config.baseUrl,
      connectivityUrl: this.config.connectivityUrl,
      connectivityTimeoutMs: this.config.connectivityTimeoutMs,
      healthTimeoutMs: this.config.healthTimeoutMs,
    });
  }

  /**
   * Rewrite text with tone and length. Resolves to null when the call was
   * suppressed as a duplicate of one issued moments ago.
   */
  rewrite(params: RewriteParams, options: RequestOptions = {}): Promise<ApiResult | null> {
    return this.submit("rewrite", params, options);
  }

  /**
   * Free-form chat query. Resolves to null when suppressed as a duplicate.
   */
  chat(params: ChatParams, options: RequestOptions = {}): Promise<ApiResult | null> {
    return this.submit("chat", params, options);
  }

  /**
   * Callback form. `attempt` is normally 0; a non-zero attempt resumes a
   * retry ladder and skips deduplication and the connectivity preflight.
   */
  execute<Op extends Operation>(
    operation: Op,
    params: OperationParams[Op],
    attempt: number,
    handlers: ExecuteHandlers,
  ): void {
    void this.run(operation, params, attempt, handlers);
  }

  checkNetworkConnectivity(signal?: AbortSignal): Promise<boolean> {
    return this.preflight.checkConnectivity(signal);
  }

  async checkBackendStatus(): Promise<{ healthy: boolean; message: string | null }> {
    const healthy = await this.preflight.checkBackendHealth();
    return { healthy, message: healthy ? null : "Backend service unavailable" };
  }

  private submit<Op extends Operation>(
    operation: Op,
    params: OperationParams[Op],
    options: RequestOptions,
  ): Promise<ApiResult | null> {
    return new Promise((resolve) => {
      this.execute(operation, params, 0, {
        signal: options.signal,
        onProgress: options.onProgress,
        onComplete: resolve,
        onDuplicate: () => resolve(null),
      });
    });
  }

  private async run<Op extends Operation>(
    operation: Op,
    params: OperationParams[Op],
    attempt: number,
    handlers: ExecuteHandlers,
  ): Promise<void> {
    const spec: OperationSpec<OperationParams[Op]> = OPERATIONS[operation];
    const ctx = createRequestContext(operation, { attempt, startedAt: this.now() });
    const lifecycle = new AbortController();
    const callerSignal = handlers.signal;
    const onCallerAbort = () => lifecycle.abort(callerSignal?.reason);
    let failSafe: FailSafeHandle | null = null;
    let completed = false;

    const complete = (result: ApiResult) => {
      if (completed) {
        // after the fail-safe the attempt loop still reports its own timeout
        const level = failSafe?.fired ? "debug" : "warn";
        log[level](`Dropping late ${operation} completion`, {
          requestId: ctx.requestId,
          ok: result.ok,
        });
        return;
      }
      completed = true;
      failSafe?.disarm();
      this.delivery.dispatch(() => handlers.onComplete(result));
    };

    const progress = (message: string) => {
      const onProgress = handlers.onProgress;
      if (onProgress) {
        this.delivery.dispatch(() => onProgress(message));
      }
    };

    if (!Number.isInteger(attempt) || attempt < 0 || attempt > this.config.maxRetries) {
      complete(fail(new ApiError("invalid_request", { detail: `Invalid attempt ${attempt}` })));
      return;
    }

    const validation = validateOrLog(spec.schema, params, operation);
    if (!validation.success) {
      const detail = validation.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
      complete(fail(new ApiError("invalid_request", { detail })));
      return;
    }
    const valid = validation.data;

    if (attempt === 0 && this.dedup.isDuplicate(spec.dedupKey(valid))) {
      log.info(`Suppressed duplicate ${operation} request`);
      emitTelemetry({ type: "dedup", success: true, operation, attempt });
      progress(DUPLICATE_REQUEST_MESSAGE);
      const onDuplicate = handlers.onDuplicate;
      if (onDuplicate) {
        this.delivery.dispatch(onDuplicate);
      }
      return;
    }

    if (callerSignal?.aborted) {
      lifecycle.abort(callerSignal.reason);
    } else {
      callerSignal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    failSafe = armFailSafe({
      ceilingMs: this.config.failSafeMs,
      onExpire: () => {
        log.error(`Fail-safe fired for ${operation} after ${this.config.failSafeMs}ms`, {
          requestId: ctx.requestId,
          attempt: ctx.attempt,
        });
        complete(fail(failSafeTimeout(ctx.attempt)));
        lifecycle.abort(new Error("Fail-safe timer expired"));
      },
    });

    try {
      await withRequestContext(ctx, () =>
        this.runAttempts(spec, valid, ctx, lifecycle.signal, complete, () => failSafe?.fired ?? false),
      );
    } catch (err) {
      log.error(`Unexpected ${operation} failure: ${getErrorMessage(err)}`, {
        requestId: ctx.requestId,
      });
      complete(fail(new ApiError("invalid_response", { detail: getErrorMessage(err), cause: err })));
    } finally {
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async runAttempts<P>(
    spec: OperationSpec<P>,
    params: P,
    ctx: RequestContext,
    signal: AbortSignal,
    complete: (result: ApiResult) => void,
    failSafeFired: () => boolean,
  ): Promise<void> {
    const finish = (error: ApiError) => {
      if (!error.cancelled) {
        log.warn(formatEscalation(escalate(error, ctx, this.now())));
        emitTelemetry({
          type: "escalation",
          success: false,
          errorKind: error.kind,
          status: error.statusCode,
          errorMessage: error.message,
        });
      }
      complete(fail(error));
    };

    // The fail-safe aborts through the same signal as the caller, but it means
    // the backend never answered: that is a timeout and counts against it.
    const expire = (countAgainstBackend: boolean) => {
      log.warn(`${ctx.operation} abandoned by fail-safe on attempt ${ctx.attempt}`, {
        requestId: ctx.requestId,
      });
      if (countAgainstBackend) {
        this.breaker.recordFailure();
      }
      finish(failSafeTimeout(ctx.attempt));
    };

    if (ctx.attempt === 0 && this.config.preflightConnectivity) {
      const reachable = await this.preflight.checkConnectivity(signal);
      if (signal.aborted) {
        if (failSafeFired()) {
          expire(false);
        } else {
          finish(classifyTransportFailure("cancelled", signal.reason));
        }
        return;
      }
      if (!reachable) {
        finish(new ApiError("no_connectivity", { detail: "Connectivity probe failed" }));
        return;
      }
    }

    for (;;) {
      const gate = await this.passBreaker();
      if (!gate.pass) {
        finish(gate.error);
        return;
      }

      const result = await this.attemptOnce(spec, params, ctx, signal);
      if (result.ok) {
        log.info(`${ctx.operation} success - response length: ${result.text.length}`);
        complete(result);
        return;
      }

      const error = result.error;
      if (error.cancelled && failSafeFired()) {
        expire(true);
        return;
      }
      if (error.cancelled) {
        if (gate.holdsProbe) this.breaker.releaseProbe();
        log.info(`${ctx.operation} cancelled on attempt ${ctx.attempt}`);
        finish(error);
        return;
      }

      const countsAgainstBackend = reflectsBackendHealth(error);
      if (gate.holdsProbe && countsAgainstBackend) {
        // the half-open trial failed: back to open with a fresh cooldown
        this.breaker.recordFailure();
      }

      const decision = this.retry.shouldRetry(error, ctx.attempt);
      if (decision.shouldRetry) {
        const delayMs = this.retry.delay(ctx.attempt);
        const nextAttempt = ctx.attempt + 1;
        log.info(
          `Retrying ${ctx.operation} after ${(delayMs / 1000).toFixed(2)}s (attempt ${nextAttempt}/${this.retry.maxRetries})`,
          { reason: decision.reason, requestId: ctx.requestId },
        );
        emitTelemetry({
          type: "retry",
          success: false,
          errorKind: error.kind,
          status: error.statusCode,
          meta: { delayMs, nextAttempt },
        });
        await this.sleep(delayMs, signal);
        if (signal.aborted) {
          if (failSafeFired()) {
            expire(true);
          } else {
            finish(classifyTransportFailure("cancelled", signal.reason));
          }
          return;
        }
        ctx.attempt = nextAttempt;
        continue;
      }

      if (!gate.holdsProbe && countsAgainstBackend) {
        this.breaker.recordFailure();
      }
      const exhausted = error.shouldRetry && this.retry.maxRetries > 0;
      finish(exhausted ? withExhaustedRetries(error, this.retry.maxRetries) : error);
      return;
    }
  }

  /**
   * Open: probe backend health and either reset or fail fast. Half-open: let
   * exactly one request through as the trial.
   */
  private async passBreaker(): Promise<BreakerGate> {
    const state = this.breaker.currentState();

    if (state.status === "closed") {
      return { pass: true, holdsProbe: false };
    }

    if (state.status === "half_open") {
      if (this.breaker.tryAcquireProbe()) {
        return { pass: true, holdsProbe: true };
      }
      return {
        pass: false,
        error: new ApiError("circuit_open", { detail: "Half-open trial already in flight" }),
      };
    }

    log.info("Circuit breaker is open, checking backend health...");
    const healthy = await this.preflight.checkBackendHealth();
    if (healthy) {
      this.breaker.reset();
      return { pass: true, holdsProbe: false };
    }
    this.breaker.recordProbeFailure();
    return {
      pass: false,
      error: new ApiError("backend_unavailable", { detail: "Health probe failed while circuit open" }),
    };
  }

  private async attemptOnce<P>(
    spec: OperationSpec<P>,
    params: P,
    ctx: RequestContext,
    signal: AbortSignal,
  ): Promise<ApiResult> {
    const headers: Record<string, string> = {
      "content-type": "application/json",
      accept: "application/json",
      "x-request-id": ctx.requestId,
    };
    const credential = await this.readCredential();
    if (credential) {
      headers.authorization = `Bearer ${credential}`;
    }

    log.debug(`${ctx.operation} attempt ${ctx.attempt}`, {
      ...spec.describe(params),
      requestId: ctx.requestId,
    });

    const started = this.now();
    const outcome = await fetchWithTimeout(
      this.fetchFn,
      joinUrl(this.config.baseUrl, spec.path),
      { method: "POST", headers, body: JSON.stringify(spec.body(params, this.config)) },
      this.config.requestTimeoutMs,
      signal,
    );

    if (!outcome.ok) {
      const error = classifyTransportFailure(outcome.reason, outcome.error);
      emitTelemetry({
        type: "attempt",
        success: false,
        latencyMs: this.now() - started,
        errorKind: error.kind,
        errorMessage: error.message,
      });
      return fail(error);
    }

    const { response } = outcome;
    const bodyText = await readBodyText(response);
    const latencyMs = this.now() - started;

    if (!response.ok) {
      const error = classifyHttpStatus(response.status, extractErrorDetail(bodyText));
      log.warn(`${ctx.operation} HTTP error ${response.status}: ${error.detail}`, {
        attempt: ctx.attempt,
        requestId: ctx.requestId,
      });
      emitTelemetry({
        type: "attempt",
        success: false,
        status: response.status,
        latencyMs,
        errorKind: error.kind,
        errorMessage: error.message,
      });
      return fail(error);
    }

    this.breaker.recordSuccess();
    emitTelemetry({ type: "attempt", success: true, status: response.status, latencyMs });
    return parseCompletion(bodyText, response.status);
  }

  private async readCredential(): Promise<string | null> {
    try {
      return await this.credentials.get();
    } catch (err) {
      log.error(`Credential store failed, sending without authorization: ${getErrorMessage(err)}`);
      return null;
    }
  }
}

/**
 * Whether a failure says something about backend health. Cancellations and
 * malformed 2xx replies do not.
 */
function reflectsBackendHealth(error: ApiError): boolean {
  if (error.cancelled || error.kind === "invalid_response" || error.kind === "no_data") {
    return false;
  }
  const status = error.statusCode;
  return !(error.kind === "http" && status !== undefined && status >= 200 && status < 300);
}

/**
 * The `error` field of an error body, else `details`; empty when the body is
 * not the expected JSON.
 */
export function extractErrorDetail(bodyText: string): string {
  if (!bodyText.trim()) {
    return "";
  }
  let json: unknown;
  try {
    json = JSON.parse(bodyText);
  } catch (err) {
    log.debug(`Error body is not JSON: ${getErrorMessage(err)}`);
    return "";
  }
  const parsed = ErrorBodySchema.safeParse(json);
  if (!parsed.success) {
    return "";
  }
  const { error, details } = parsed.data;
  return error || details || "";
}

/**
 * Turn a 2xx body into the completion text.
 */
export function parseCompletion(bodyText: string, statusCode: number): ApiResult {
  if (!bodyText.trim()) {
    return fail(new ApiError("no_data", { detail: "Empty response body" }));
  }

  let json: unknown;
  try {
    json = JSON.parse(bodyText);
  } catch (err) {
    log.warn(`JSON parsing error: ${getErrorMessage(err)}`);
    return fail(new ApiError("invalid_response", { detail: "Response is not JSON", cause: err }));
  }

  const parsed = CompletionBodySchema.safeParse(json);
  if (!parsed.success) {
    return fail(new ApiError("invalid_response", { detail: "Unexpected response shape" }));
  }

  const { text, error, details } = parsed.data;
  if (error !== undefined) {
    return fail(classifyHttpStatus(statusCode, details ?? error));
  }
  if (text === undefined) {
    return fail(new ApiError("invalid_response", { detail: "Response has no text field" }));
  }
  return { ok: true, text: text.trim() };
}

/**
 * Outcome reported when the fail-safe ceiling passes. Carries the retries
 * already made so the user hears they were attempted.
 */
function failSafeTimeout(retries: number): ApiError {
  return new ApiError("timeout", {
    detail: "Fail-safe timer expired",
    exhaustedRetries: retries > 0 ? retries : undefined,
  });
}

export function createApiClient(options: ApiClientOptions = {}): ApiClient {
  return new ApiClient(options);
}
