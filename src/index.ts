export {
  ApiClient,
  createApiClient,
  DUPLICATE_REQUEST_MESSAGE,
  type ApiClientOptions,
  type ApiResult,
  type ExecuteHandlers,
  type Operation,
  type OperationParams,
  type RequestOptions,
} from "./client/api-client.js";
export {
  CircuitBreaker,
  formatCircuitState,
  type CircuitBreakerOptions,
  type CircuitSnapshot,
  type CircuitState,
} from "./client/circuit-breaker.js";
export {
  ContractValidationError,
  type ChatParams,
  type RewriteParams,
} from "./client/contracts/schema-validators.js";
export { createSerialDelivery, type DeliveryContext } from "./client/delivery.js";
export {
  API_ERROR_KINDS,
  ApiError,
  isApiError,
  isRetryable,
  userFriendlyMessage,
  type ApiErrorKind,
} from "./client/error-taxonomy.js";
export { armFailSafe, type FailSafeHandle } from "./client/fail-safe.js";
export type { FetchLike } from "./client/http.js";
export { Preflight, type PreflightOptions } from "./client/preflight.js";
export {
  chatRequestKey,
  RequestDeduplicator,
  rewriteRequestKey,
  type RequestDeduplicatorOptions,
} from "./client/request-dedup.js";
export {
  RetryScheduler,
  type RetryDecision,
  type RetrySchedulerOptions,
} from "./client/retry-policy.js";
export {
  ClientConfigSchema,
  loadClientConfig,
  resolveClientConfig,
  type ClientConfig,
  type ClientConfigInput,
} from "./config/client-config.js";
export {
  createEnvCredentialStore,
  createStaticCredentialStore,
  type CredentialStore,
} from "./credentials/credential-store.js";
export { setLogLevel, setLogSink, type LogLevel } from "./logging/subsystem.js";
export {
  clearTelemetryListeners,
  onTelemetry,
  type TelemetryEvent,
} from "./observability/telemetry.js";
