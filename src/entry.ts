#!/usr/bin/env node
import { buildProgram } from "./cli/relay-cli.js";
import { parseLogLevel, setLogLevel } from "./logging/subsystem.js";

setLogLevel(parseLogLevel(process.env.KEYRELAY_LOG_LEVEL, "warn"));

await buildProgram().parseAsync(process.argv);
