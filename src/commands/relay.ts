/**
 * rewrite / chat / health / config commands.
 *
 * @module commands/relay
 */

import { ApiClient, DUPLICATE_REQUEST_MESSAGE, type ApiResult } from "../client/api-client.js";
import { formatCircuitState } from "../client/circuit-breaker.js";
import { loadClientConfig } from "../config/client-config.js";
import {
  createEnvCredentialStore,
  redactCredential,
  type CredentialStore,
} from "../credentials/credential-store.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";

export type RelayDeps = {
  env?: NodeJS.ProcessEnv;
  /** Build the client; tests inject one backed by a fake fetch. */
  createClient?: (env: NodeJS.ProcessEnv) => ApiClient;
};

export type RewriteCommandOptions = {
  text: string;
  tone?: number;
  length?: number;
  preset?: string;
  locale?: string;
  json?: boolean;
};

export type ChatCommandOptions = {
  query: string;
  json?: boolean;
};

export type HealthCommandOptions = {
  json?: boolean;
};

function credentialsFromEnv(env: NodeJS.ProcessEnv): CredentialStore {
  return createEnvCredentialStore(env);
}

function defaultCreateClient(env: NodeJS.ProcessEnv): ApiClient {
  return new ApiClient({ config: loadClientConfig(env), credentials: credentialsFromEnv(env) });
}

function resolveClient(deps: RelayDeps): ApiClient {
  const env = deps.env ?? process.env;
  return (deps.createClient ?? defaultCreateClient)(env);
}

function reportResult(result: ApiResult | null, json: boolean | undefined, runtime: RuntimeEnv) {
  if (result === null) {
    runtime.error(DUPLICATE_REQUEST_MESSAGE);
    runtime.exit(2);
    return;
  }

  if (json) {
    runtime.log(
      JSON.stringify(
        result.ok
          ? { ok: true, text: result.text }
          : {
              ok: false,
              kind: result.error.kind,
              status: result.error.statusCode,
              message: result.error.message,
              userMessage: result.error.userMessage,
            },
        null,
        2,
      ),
    );
  } else if (result.ok) {
    runtime.log(result.text);
  } else {
    runtime.error(result.error.userMessage);
  }

  if (!result.ok) {
    runtime.exit(1);
  }
}

export async function rewriteCommand(
  opts: RewriteCommandOptions,
  runtime: RuntimeEnv = defaultRuntime,
  deps: RelayDeps = {},
): Promise<void> {
  const client = resolveClient(deps);
  const result = await client.rewrite({
    text: opts.text,
    tone: opts.tone ?? 0.5,
    length: opts.length ?? 0.5,
    presetId: opts.preset,
    locale: opts.locale,
  });
  reportResult(result, opts.json, runtime);
}

export async function chatCommand(
  opts: ChatCommandOptions,
  runtime: RuntimeEnv = defaultRuntime,
  deps: RelayDeps = {},
): Promise<void> {
  const client = resolveClient(deps);
  const result = await client.chat({ query: opts.query });
  reportResult(result, opts.json, runtime);
}

/**
 * Run both preflight probes and report breaker state.
 */
export async function healthCommand(
  opts: HealthCommandOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
  deps: RelayDeps = {},
): Promise<void> {
  const client = resolveClient(deps);
  const [network, backend] = await Promise.all([
    client.checkNetworkConnectivity(),
    client.checkBackendStatus(),
  ]);
  const breaker = client.breaker.snapshot();

  if (opts.json) {
    runtime.log(
      JSON.stringify(
        {
          network,
          backend: backend.healthy,
          breaker: breaker.state.status,
          consecutiveFailures: breaker.consecutiveFailures,
        },
        null,
        2,
      ),
    );
  } else {
    const lines: string[] = [];
    lines.push("Relay Health:");
    lines.push("-".repeat(40));
    lines.push(`Network:  ${network ? "reachable" : "unreachable"}`);
    lines.push(`Backend:  ${backend.healthy ? "healthy" : (backend.message ?? "unhealthy")}`);
    lines.push(`Breaker:  ${formatCircuitState(breaker.state)}`);
    lines.push("-".repeat(40));
    runtime.log(lines.join("\n"));
  }

  if (!network || !backend.healthy) {
    runtime.exit(1);
  }
}

/**
 * Print the resolved configuration; the credential is redacted.
 */
export async function configCommand(
  runtime: RuntimeEnv = defaultRuntime,
  deps: Pick<RelayDeps, "env"> = {},
): Promise<void> {
  const env = deps.env ?? process.env;
  const config = loadClientConfig(env);
  const credential = await credentialsFromEnv(env).get();
  runtime.log(JSON.stringify({ ...config, credential: redactCredential(credential) }, null, 2));
}
