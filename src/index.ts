#!/usr/bin/env node
import * as path from "path";
import * as dotenv from "dotenv";
import { USAGE, parseArgs, type ParsedArgs } from "./cli/parseArgs";
import { readEnvSettings } from "./config/loader";
import { runCommand } from "./commands";
import { AssetpressError, UsageError, errorMessage } from "./lib/errors";
import { getLogLevel, setLogLevel } from "./lib/logger";
import { EXIT_FAILED, EXIT_INTERRUPTED } from "./pipeline/report";

// --- Main ---

async function main(): Promise<number> {
  // Environment from ./.env, never overriding variables already set.
  dotenv.config({ path: path.resolve(process.cwd(), ".env"), override: false });

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      return EXIT_FAILED;
    }
    throw err;
  }

  const controller = new AbortController();
  let interrupts = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    interrupts++;
    if (interrupts > 1) {
      console.error(`\nReceived ${signal} again, exiting.`);
      process.exit(EXIT_INTERRUPTED);
    }
    console.error(`\nReceived ${signal}, finishing running jobs...`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    const env = readEnvSettings(process.env);
    const level = parsed.logLevel ?? env.logLevel;
    if (level !== undefined) setLogLevel(level);

    return await runCommand(parsed, {
      cwd: process.cwd(),
      env: process.env,
      signal: controller.signal,
    });
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    // Unexpected errors get a stack trace in verbose mode
    if (!(err instanceof AssetpressError) && err instanceof Error && getLogLevel() === "verbose") {
      console.error(err.stack);
    }
    return EXIT_FAILED;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = EXIT_FAILED;
  }
);
