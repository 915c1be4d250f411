import * as path from "path";
import * as chokidar from "chokidar";
import type { FsEvent } from "../contracts";
import { errorMessage } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { isHiddenName, isWithin } from "../pipeline/scan";
import type { EventChannel } from "./channel";

const log = createLogger("watch");

export interface FsSourceOptions {
  /** Directories whose changes are never reported (output, cache). */
  ignore?: string[];
}

/**
 * Feed filesystem changes under `root` into `channel`.
 * add/change/unlink become create/modify/delete.
 */
export function watchDirectory(
  root: string,
  channel: EventChannel<FsEvent>,
  options: FsSourceOptions = {}
): chokidar.FSWatcher {
  const resolvedRoot = path.resolve(root);
  const ignoredDirs = (options.ignore ?? []).map((d) => path.resolve(d));
  const isIgnored = (candidate: string): boolean => {
    const resolved = path.resolve(candidate);
    if (resolved === resolvedRoot) return false;
    if (isHiddenName(path.basename(resolved))) return true;
    return ignoredDirs.some((d) => isWithin(resolved, d));
  };

  const watcher = chokidar.watch(resolvedRoot, {
    ignoreInitial: true,
    persistent: true,
    ignored: isIgnored,
  });

  const push = (kind: FsEvent["kind"]) => (filePath: string) => {
    channel.push({ kind, path: path.resolve(filePath) });
  };

  watcher
    .on("add", push("create"))
    .on("change", push("modify"))
    .on("unlink", push("delete"))
    .on("error", (err: unknown) => {
      log.error(`Watcher error: ${errorMessage(err)}`);
    });

  return watcher;
}

/** Resolves once the initial scan is done; changes after that are reported. */
export function whenReady(watcher: chokidar.FSWatcher): Promise<void> {
  return new Promise((resolve) => {
    watcher.once("ready", () => resolve());
  });
}
