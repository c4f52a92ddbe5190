import { z } from "zod";
import { validateOrThrow } from "../client/contracts/schema-validators.js";

/**
 * Every tunable of the client. Breaker cooldown and half-open window have
 * shipped as both 8s/5s and 30s/10s; the shorter pair is the default and
 * either is accepted.
 */
export const ClientConfigSchema = z.object({
  baseUrl: z.string().url().default("http://localhost:3000"),
  connectivityUrl: z.string().url().default("https://www.apple.com"),
  requestTimeoutMs: z.number().int().min(100).max(120_000).default(15_000),
  connectivityTimeoutMs: z.number().int().min(100).max(30_000).default(3_000),
  healthTimeoutMs: z.number().int().min(100).max(30_000).default(2_000),
  maxRetries: z.number().int().min(0).max(10).default(3),
  baseRetryDelayMs: z.number().int().min(0).max(60_000).default(1_000),
  jitterRange: z.number().min(0).max(1).default(0.3),
  minRetryDelayMs: z.number().int().min(0).max(60_000).default(100),
  failureThreshold: z.number().int().min(1).max(100).default(3),
  cooldownMs: z.number().int().min(0).max(600_000).default(8_000),
  halfOpenTimeoutMs: z.number().int().min(0).max(600_000).default(5_000),
  dedupWindowMs: z.number().int().min(0).max(600_000).default(5_000),
  dedupRetentionMs: z.number().int().min(0).max(3_600_000).default(300_000),
  failSafeMs: z.number().int().min(1_000).max(600_000).default(60_000),
  defaultLocale: z.string().min(1).default("en-GB"),
  preflightConnectivity: z.boolean().default(true),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

type EnvLike = Record<string, string | undefined>;

type NumericKey = {
  [K in keyof ClientConfig]: ClientConfig[K] extends number ? K : never;
}[keyof ClientConfig];

const NUMERIC_ENV: ReadonlyArray<{
  key: NumericKey;
  envVar: string;
  min: number;
  max: number;
  integer: boolean;
}> = [
  { key: "requestTimeoutMs", envVar: "KEYRELAY_REQUEST_TIMEOUT_MS", min: 100, max: 120_000, integer: true },
  { key: "connectivityTimeoutMs", envVar: "KEYRELAY_CONNECTIVITY_TIMEOUT_MS", min: 100, max: 30_000, integer: true },
  { key: "healthTimeoutMs", envVar: "KEYRELAY_HEALTH_TIMEOUT_MS", min: 100, max: 30_000, integer: true },
  { key: "maxRetries", envVar: "KEYRELAY_MAX_RETRIES", min: 0, max: 10, integer: true },
  { key: "baseRetryDelayMs", envVar: "KEYRELAY_RETRY_BASE_MS", min: 0, max: 60_000, integer: true },
  { key: "jitterRange", envVar: "KEYRELAY_RETRY_JITTER", min: 0, max: 1, integer: false },
  { key: "minRetryDelayMs", envVar: "KEYRELAY_RETRY_MIN_MS", min: 0, max: 60_000, integer: true },
  { key: "failureThreshold", envVar: "KEYRELAY_CIRCUIT_FAILURE_THRESHOLD", min: 1, max: 100, integer: true },
  { key: "cooldownMs", envVar: "KEYRELAY_CIRCUIT_COOLDOWN_MS", min: 0, max: 600_000, integer: true },
  { key: "halfOpenTimeoutMs", envVar: "KEYRELAY_CIRCUIT_HALF_OPEN_MS", min: 0, max: 600_000, integer: true },
  { key: "dedupWindowMs", envVar: "KEYRELAY_DEDUP_WINDOW_MS", min: 0, max: 600_000, integer: true },
  { key: "dedupRetentionMs", envVar: "KEYRELAY_DEDUP_RETENTION_MS", min: 0, max: 3_600_000, integer: true },
  { key: "failSafeMs", envVar: "KEYRELAY_FAIL_SAFE_MS", min: 1_000, max: 600_000, integer: true },
];

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function parseNumber(raw: string | undefined, min: number, max: number, integer: boolean) {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const parsed = integer ? Number.parseInt(raw, 10) : Number(raw);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }
  return clamp(parsed, min, max);
}

function parseBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return undefined;
}

function parseOptionalString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolve config from `KEYRELAY_*` environment variables layered over the
 * schema defaults, then over explicit overrides. Out-of-range numbers are
 * clamped; unparsable values fall back to the default.
 */
export function loadClientConfig(
  env: EnvLike = process.env,
  overrides: ClientConfigInput = {},
): ClientConfig {
  const fromEnv: Record<string, unknown> = {};

  const baseUrl = parseOptionalString(env.KEYRELAY_BASE_URL);
  if (baseUrl) fromEnv.baseUrl = baseUrl.replace(/\/+$/, "");
  const connectivityUrl = parseOptionalString(env.KEYRELAY_CONNECTIVITY_URL);
  if (connectivityUrl) fromEnv.connectivityUrl = connectivityUrl;
  const locale = parseOptionalString(env.KEYRELAY_LOCALE);
  if (locale) fromEnv.defaultLocale = locale;
  const preflight = parseBoolean(env.KEYRELAY_PREFLIGHT_CONNECTIVITY);
  if (preflight !== undefined) fromEnv.preflightConnectivity = preflight;

  for (const spec of NUMERIC_ENV) {
    const value = parseNumber(env[spec.envVar], spec.min, spec.max, spec.integer);
    if (value !== undefined) {
      fromEnv[spec.key] = value;
    }
  }

  return validateOrThrow(ClientConfigSchema, { ...fromEnv, ...overrides }, "client-config");
}

/**
 * Config with defaults only, plus overrides. Used by tests and embedders that
 * do not read the environment.
 */
export function resolveClientConfig(overrides: ClientConfigInput = {}): ClientConfig {
  return validateOrThrow(ClientConfigSchema, overrides, "client-config");
}
