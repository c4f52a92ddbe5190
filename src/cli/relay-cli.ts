/**
 * Relay CLI registration
 *
 * @module cli/relay-cli
 */

import { Command } from "commander";
import { chatCommand, configCommand, healthCommand, rewriteCommand, type RelayDeps } from "../commands/relay.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { parseNumberOption, runCommandWithRuntime } from "./cli-utils.js";

export function registerRelayCli(
  program: Command,
  runtime: RuntimeEnv = defaultRuntime,
  deps: RelayDeps = {},
) {
  const run = (action: () => Promise<void>) => runCommandWithRuntime(runtime, action);

  program
    .command("rewrite")
    .description("Rewrite text with a tone and length")
    .argument("<text>", "Text to rewrite")
    .option("-t, --tone <0..1>", "0 = casual, 1 = formal", "0.5")
    .option("-l, --length <0..1>", "0 = detailed, 1 = brief", "0.5")
    .option("-p, --preset <id>", "Preset identifier (e.g. fix_grammar)")
    .option("--locale <locale>", "Spelling locale (default from KEYRELAY_LOCALE)")
    .option("--json", "Output as JSON")
    .action(async (text: string, opts: { tone: string; length: string; preset?: string; locale?: string; json?: boolean }) => {
      await run(async () => {
        await rewriteCommand(
          {
            text,
            tone: parseNumberOption(opts.tone, "tone"),
            length: parseNumberOption(opts.length, "length"),
            preset: opts.preset,
            locale: opts.locale,
            json: opts.json,
          },
          runtime,
          deps,
        );
      });
    });

  program
    .command("chat")
    .description("Ask a free-form question")
    .argument("<query>", "Question to send")
    .option("--json", "Output as JSON")
    .action(async (query: string, opts: { json?: boolean }) => {
      await run(async () => {
        await chatCommand({ query, json: opts.json }, runtime, deps);
      });
    });

  program
    .command("health")
    .description("Probe network connectivity and backend health")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }) => {
      await run(async () => {
        await healthCommand({ json: opts.json }, runtime, deps);
      });
    });

  program
    .command("config")
    .description("Show the resolved client configuration")
    .action(async () => {
      await run(async () => {
        await configCommand(runtime, deps);
      });
    });
}

export function buildProgram(runtime: RuntimeEnv = defaultRuntime, deps: RelayDeps = {}): Command {
  const program = new Command();
  program
    .name("keyrelay")
    .description("Resilient client for the keyboard AI backend")
    .version("0.1.0");
  registerRelayCli(program, runtime, deps);
  return program;
}
