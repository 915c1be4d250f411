import type { BuildJob, BuildReport, FsEvent } from "../contracts";
import { errorMessage } from "../lib/errors";
import { createLogger } from "../lib/logger";
import type { DirtyPlan } from "../pipeline/planner";
import { createReport, failedOutcome, mergeReports } from "../pipeline/report";
import type { EventChannel } from "./channel";

const log = createLogger("watch");

export const DEFAULT_DEBOUNCE_MS = 300;

export type WatchState = "idle" | "pending" | "flushing" | "stopped";

/** The parts of Planner, Scheduler and CacheStore the service drives. */
export interface WatchCollaborators {
  planner: { planPaths(paths: Iterable<string>): Promise<DirtyPlan> };
  scheduler: { submit(jobs: BuildJob[], signal?: AbortSignal): Promise<BuildReport> };
  cache: { invalidate(sourcePath: string): unknown; flush(): Promise<boolean> };
}

export interface FlushResult {
  /** Absolute paths that triggered this flush, sorted. */
  paths: string[];
  /** Cache sourcePaths invalidated because their files are gone. */
  removed: string[];
  report: BuildReport;
}

export interface WatchServiceOptions extends WatchCollaborators {
  channel: EventChannel<FsEvent>;
  debounceMs?: number;
  onFlush?: (result: FlushResult) => void;
  onStateChange?: (state: WatchState) => void;
}

/**
 * Debounced rebuild loop.
 *
 * idle -> pending on the first event; each further event restarts the
 * debounce timer and joins the dirty set; when the timer expires the
 * service flushes (plan, build, flush cache) and returns to idle.
 *
 * Cancellation: while pending, the dirty set is dropped without a flush.
 * During a flush the signal reaches the scheduler, which stops dispatching
 * new jobs; running jobs finish, the cache is flushed, then the loop
 * exits. Job failures are logged and the loop keeps going.
 */
export class WatchService {
  private readonly channel: EventChannel<FsEvent>;
  private readonly collaborators: WatchCollaborators;
  private readonly debounceMs: number;
  private readonly onFlush?: (result: FlushResult) => void;
  private readonly onStateChange?: (state: WatchState) => void;
  private currentState: WatchState = "idle";
  private readonly dirty = new Set<string>();

  constructor(options: WatchServiceOptions) {
    this.channel = options.channel;
    this.collaborators = {
      planner: options.planner,
      scheduler: options.scheduler,
      cache: options.cache,
    };
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.onFlush = options.onFlush;
    this.onStateChange = options.onStateChange;
  }

  get state(): WatchState {
    return this.currentState;
  }

  /** Paths waiting for the next flush. */
  get pendingPaths(): string[] {
    return [...this.dirty].sort();
  }

  async run(signal: AbortSignal): Promise<void> {
    while (this.currentState !== "stopped") {
      const timeout = this.currentState === "pending" ? this.debounceMs : undefined;
      const next = await this.channel.take(timeout, signal);

      switch (next.kind) {
        case "event":
          this.dirty.add(next.value.path);
          log.debug(`${next.value.kind} ${next.value.path}`);
          this.setState("pending");
          break;
        case "timeout":
          await this.flush(signal);
          this.setState(signal.aborted ? "stopped" : "idle");
          break;
        case "closed":
          // Source ended: build what is pending, then stop
          if (this.dirty.size > 0) await this.flush(signal);
          this.setState("stopped");
          break;
        case "aborted":
          if (this.dirty.size > 0) {
            log.info(`Stopping; dropped ${this.dirty.size} pending change(s)`);
          }
          this.dirty.clear();
          this.setState("stopped");
          break;
      }
    }
  }

  private setState(state: WatchState): void {
    if (state === this.currentState) return;
    this.currentState = state;
    this.onStateChange?.(state);
  }

  private async flush(signal: AbortSignal): Promise<void> {
    this.setState("flushing");
    const paths = this.pendingPaths;
    this.dirty.clear();
    const { planner, scheduler, cache } = this.collaborators;

    try {
      const plan = await planner.planPaths(paths);
      for (const sourcePath of plan.removed) {
        cache.invalidate(sourcePath);
        log.info(`Removed ${sourcePath}`);
      }

      const built = await scheduler.submit(plan.jobs, signal);
      const failures = createReport(
        plan.failures.map((f) => failedOutcome(f.id, [f.source], f.error)),
        false
      );
      const report = mergeReports(built, failures);
      await cache.flush();

      const { counts } = report;
      log.info(
        `Rebuilt ${counts.built}, cached ${counts.cached}, failed ${counts.failed}` +
          (counts.cancelled > 0 ? `, cancelled ${counts.cancelled}` : "")
      );
      for (const o of report.outcomes) {
        if (o.status === "failed") log.error(`${o.id}: ${o.error?.message ?? "unknown error"}`);
      }
      this.onFlush?.({ paths, removed: plan.removed, report });
    } catch (err) {
      log.error(`Rebuild failed: ${errorMessage(err)}`);
    }
  }
}
