import type { BuildReport, JobErrorKind, JobOutcome, JobStatus } from "../contracts";
import { AssetIOError, AtlasOverflowError, ProcessorError, errorMessage } from "../lib/errors";
import { formatDuration, formatSize, percentChange } from "../lib/format";
import type { Logger } from "../lib/logger";

const MAX_LISTED_FAILURES = 10;

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_INTERRUPTED = 130;

export function emptyCounts(): Record<JobStatus, number> {
  return { built: 0, cached: 0, planned: 0, failed: 0, cancelled: 0 };
}

/** Sort outcomes by job id and tally them. Success means nothing failed. */
export function createReport(outcomes: JobOutcome[], dryRun: boolean): BuildReport {
  const sorted = [...outcomes].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  const counts = emptyCounts();
  for (const o of sorted) counts[o.status]++;
  return { dryRun, outcomes: sorted, counts, success: counts.failed === 0 };
}

export function mergeReports(a: BuildReport, b: BuildReport): BuildReport {
  return createReport([...a.outcomes, ...b.outcomes], a.dryRun || b.dryRun);
}

export function classifyError(err: unknown): { kind: JobErrorKind; message: string } {
  if (err instanceof AtlasOverflowError) return { kind: "AtlasOverflowError", message: err.message };
  if (err instanceof AssetIOError) return { kind: "AssetIOError", message: err.message };
  if (err instanceof ProcessorError) return { kind: "ProcessorError", message: err.message };
  return { kind: "ProcessorError", message: errorMessage(err) };
}

/** Outcome for a job that failed before it could be scheduled. */
export function failedOutcome(id: string, sources: string[], err: unknown): JobOutcome {
  return {
    id,
    type: "asset",
    sources,
    status: "failed",
    error: classifyError(err),
    inputBytes: 0,
    outputBytes: 0,
    durationMs: 0,
  };
}

export function exitCodeFor(report: BuildReport): number {
  if (!report.success) return EXIT_FAILED;
  if (report.counts.cancelled > 0) return EXIT_INTERRUPTED;
  return EXIT_OK;
}

/** Print the end-of-build summary and the first failures. */
export function printReport(report: BuildReport, log: Logger, elapsedMs: number): void {
  const { counts } = report;
  if (report.dryRun) {
    log.info(`Dry run: ${counts.planned} to build, ${counts.cached} cached`);
    for (const o of report.outcomes) {
      if (o.status === "planned") log.info(`  would build ${o.id}`);
    }
  } else {
    log.info(
      `Processed ${counts.built}, skipped ${counts.cached} (cached), ` +
        `failed ${counts.failed}` +
        (counts.cancelled > 0 ? `, cancelled ${counts.cancelled}` : "") +
        ` in ${formatDuration(elapsedMs)}`
    );
    const built = report.outcomes.filter((o) => o.status === "built");
    const input = built.reduce((sum, o) => sum + o.inputBytes, 0);
    const output = built.reduce((sum, o) => sum + o.outputBytes, 0);
    if (built.length > 0 && input > 0) {
      log.info(
        `Size: ${formatSize(input)} -> ${formatSize(output)} (${percentChange(input, output).toFixed(1)}%)`
      );
    }
  }

  const failures = report.outcomes.filter((o) => o.status === "failed");
  for (const o of failures.slice(0, MAX_LISTED_FAILURES)) {
    log.error(`${o.id}: ${o.error?.message ?? "unknown error"}`);
  }
  if (failures.length > MAX_LISTED_FAILURES) {
    log.error(`... and ${failures.length - MAX_LISTED_FAILURES} more`);
  }
}
