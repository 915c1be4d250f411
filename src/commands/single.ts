import * as path from "path";
import type { AssetJob, JobOutcome, Pipeline } from "../contracts";
import { formatSize, percentChange } from "../lib/format";
import type { Logger } from "../lib/logger";
import { CacheStore } from "../pipeline/cache";
import { EXIT_FAILED, EXIT_INTERRUPTED, EXIT_OK } from "../pipeline/report";
import { extensionFor } from "../pipeline/rules";
import { readAssetRecord } from "../pipeline/scan";
import { Scheduler } from "../pipeline/scheduler";
import { createDefaultProcessors } from "../processors";
import type { CommandContext } from "./context";

/**
 * Output path for a one-file command: the input's directory and stem with
 * the target extension. When that lands on the input itself, ".optimized"
 * goes before the extension.
 */
export function defaultOutputPath(input: string, format: Pipeline["format"]): string {
  const dir = path.dirname(input);
  const ext = format !== null ? `.${extensionFor(format)}` : path.extname(input);
  const name = path.basename(input, path.extname(input));
  const candidate = path.join(dir, `${name}${ext}`);
  if (path.resolve(candidate) !== path.resolve(input)) return candidate;
  return path.join(dir, `${name}.optimized${ext}`);
}

/**
 * Run one pipeline over one file through the Scheduler, with the cache off.
 * Prints the size change and returns the exit code.
 */
export async function runSingleFile(
  input: string,
  output: string,
  pipeline: Pipeline,
  ctx: CommandContext,
  log: Logger
): Promise<{ exitCode: number; outcome: JobOutcome }> {
  const record = await readAssetRecord(path.dirname(input), input);
  const job: AssetJob = {
    type: "asset",
    id: path.basename(output),
    record,
    pipeline,
    outputPath: path.resolve(output),
  };
  const scheduler = new Scheduler({
    cache: new CacheStore({ directory: path.dirname(output), enabled: false }),
    processors: ctx.processors ?? createDefaultProcessors(),
    concurrency: 1,
  });

  const report = await scheduler.submit([job], ctx.signal);
  const [outcome] = report.outcomes;
  switch (outcome.status) {
    case "failed":
      log.error(`${record.relPath}: ${outcome.error?.message ?? "unknown error"}`);
      return { exitCode: EXIT_FAILED, outcome };
    case "cancelled":
      log.warn(`${record.relPath}: cancelled`);
      return { exitCode: EXIT_INTERRUPTED, outcome };
    default:
      log.info(`${input} -> ${job.outputPath}`);
      log.info(
        `Size: ${formatSize(outcome.inputBytes)} -> ${formatSize(outcome.outputBytes)} ` +
          `(${percentChange(outcome.inputBytes, outcome.outputBytes).toFixed(1)}%)`
      );
      return { exitCode: EXIT_OK, outcome };
  }
}
