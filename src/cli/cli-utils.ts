import type { RuntimeEnv } from "../runtime.js";

/**
 * Run a command action; any thrown error is printed and turns into exit 1.
 */
export async function runCommandWithRuntime(
  runtime: RuntimeEnv,
  action: () => Promise<void>,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    runtime.error(err instanceof Error ? err.message : String(err));
    runtime.exit(1);
  }
}

export function parseNumberOption(raw: string, label: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${label} must be a number, got "${raw}"`);
  }
  return value;
}
