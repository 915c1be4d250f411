import type { FsEvent } from "../contracts";
import type { WatchArgs } from "../cli/parseArgs";
import { createLogger } from "../lib/logger";
import { EXIT_INTERRUPTED, EXIT_OK, printReport } from "../pipeline/report";
import { EventChannel } from "../watch/channel";
import { watchDirectory, whenReady } from "../watch/fsSource";
import { WatchService } from "../watch/service";
import { buildAll } from "./build";
import type { CommandContext } from "./context";
import { openBuildSession } from "./session";

const log = createLogger("watch");

/**
 * Build once, then rebuild changed sources until the signal aborts.
 * The watcher is ready before the first build starts, so edits made while
 * it runs are queued and picked up by the first flush.
 * Returns 130 when stopped by a signal.
 */
export async function runWatch(args: WatchArgs, ctx: CommandContext): Promise<number> {
  const signal = ctx.signal ?? new AbortController().signal;
  const session = openBuildSession({ ...args, dryRun: false, force: false }, ctx);

  const channel = new EventChannel<FsEvent>();
  const watcher = watchDirectory(session.sourceDir, channel, {
    ignore: [session.outputDir, session.loaded.cacheDir],
  });

  try {
    await whenReady(watcher);

    const started = performance.now();
    const initial = await buildAll(session, false, signal);
    printReport(initial.report, log, performance.now() - started);
    if (signal.aborted) return EXIT_INTERRUPTED;

    const service = new WatchService({
      channel,
      planner: session.planner,
      scheduler: session.scheduler,
      cache: session.cache,
      debounceMs: args.debounce,
    });
    log.info(`Watching ${session.sourceDir} (Ctrl+C to stop)`);
    await service.run(signal);
  } finally {
    channel.close();
    await watcher.close();
    await session.cache.flush();
  }
  log.info("Stopped");
  return signal.aborted ? EXIT_INTERRUPTED : EXIT_OK;
}
