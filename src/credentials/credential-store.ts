/**
 * Bearer credential for backend calls. The value is opaque to the client.
 */

export interface CredentialStore {
  get(): string | null | Promise<string | null>;
}

export const DEFAULT_CREDENTIAL_ENV_VAR = "KEYRELAY_API_KEY";

/**
 * Credential read from an environment variable at each call, so a key
 * rotated in the environment is picked up without rebuilding the client.
 * Blank values count as absent.
 */
export function createEnvCredentialStore(
  env: NodeJS.ProcessEnv = process.env,
  envVar: string = DEFAULT_CREDENTIAL_ENV_VAR,
): CredentialStore {
  return {
    get() {
      const value = env[envVar]?.trim();
      return value ? value : null;
    },
  };
}

export function createStaticCredentialStore(value: string | null): CredentialStore {
  const trimmed = value?.trim();
  return { get: () => (trimmed ? trimmed : null) };
}

export const noCredentials: CredentialStore = { get: () => null };

export function redactCredential(value: string | null): string {
  if (!value) return "(none)";
  if (value.length <= 8) return "****";
  return `${value.slice(0, 4)}…${value.slice(-2)}`;
}
