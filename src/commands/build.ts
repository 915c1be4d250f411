import type { BuildReport } from "../contracts";
import type { BuildArgs } from "../cli/parseArgs";
import { createLogger } from "../lib/logger";
import { createReport, exitCodeFor, failedOutcome, mergeReports, printReport } from "../pipeline/report";
import type { CommandContext } from "./context";
import { openBuildSession, type BuildSession } from "./session";

const log = createLogger("build");

export interface BuildResult {
  report: BuildReport;
  exitCode: number;
  /** Cache sourcePaths dropped because their files no longer exist. */
  pruned: string[];
}

/** Drop cache entries whose source is gone from the tree. */
function pruneStaleEntries(session: BuildSession, liveSources: Set<string>): string[] {
  const pruned: string[] = [];
  for (const source of session.cache.sources()) {
    if (!liveSources.has(source)) {
      session.cache.invalidate(source);
      pruned.push(source);
    }
  }
  return pruned;
}

/**
 * One full pass over a session: load the cache, plan every source, run
 * the jobs, prune entries for deleted sources and flush the cache once.
 * A dry run plans and looks up but writes nothing, the manifest included.
 */
export async function buildAll(
  session: BuildSession,
  dryRun: boolean,
  signal?: AbortSignal
): Promise<{ report: BuildReport; pruned: string[] }> {
  await session.cache.load();
  const plan = await session.planner.planAll();
  if (plan.skipped.length > 0) {
    log.debug(`Skipping ${plan.skipped.length} unrecognized file(s): ${plan.skipped.join(", ")}`);
  }

  const built = await session.scheduler.submit(plan.jobs, signal);
  const planFailures = createReport(
    plan.failures.map((f) => failedOutcome(f.id, [f.source], f.error)),
    dryRun
  );
  const report = mergeReports(built, planFailures);

  let pruned: string[] = [];
  if (!dryRun) {
    const live = new Set(plan.sources);
    for (const job of plan.jobs) {
      if (job.type === "atlas") live.add(job.groupId);
    }
    pruned = pruneStaleEntries(session, live);
    await session.cache.flush();
  }
  return { report, pruned };
}

export async function runBuild(args: BuildArgs, ctx: CommandContext): Promise<BuildResult> {
  const started = performance.now();
  const session = openBuildSession(args, ctx);
  const workers = session.concurrency;

  log.info(
    `Building ${session.sourceDir} -> ${session.outputDir} ` +
      `(preset ${session.rules.presetName}, ${workers} worker${workers === 1 ? "" : "s"}` +
      `${args.dryRun ? ", dry run" : ""})`
  );

  const { report, pruned } = await buildAll(session, args.dryRun, ctx.signal);
  printReport(report, log, performance.now() - started);
  return { report, exitCode: exitCodeFor(report), pruned };
}
