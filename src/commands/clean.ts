import * as fs from "fs";
import * as path from "path";
import type { CleanArgs } from "../cli/parseArgs";
import { loadConfig } from "../config/loader";
import { directorySize } from "../lib/dirSize";
import { ConfigError } from "../lib/errors";
import { formatSize } from "../lib/format";
import { createLogger } from "../lib/logger";
import { CacheStore } from "../pipeline/cache";
import { EXIT_OK } from "../pipeline/report";
import { isWithin } from "../pipeline/scan";
import type { CommandContext } from "./context";

const log = createLogger("clean");

export interface CleanResult {
  cacheBytes: number;
  outputBytes: number;
}

/**
 * Delete the cache directory; with --all also the output directory.
 * Works without a config file, using the defaults.
 */
export async function cleanProject(args: CleanArgs, ctx: CommandContext): Promise<CleanResult> {
  const loaded = loadConfig({ cwd: ctx.cwd, configPath: args.config, allowMissing: true, env: ctx.env });
  const cacheDir = args.cacheDir !== undefined ? path.resolve(ctx.cwd, args.cacheDir) : loaded.cacheDir;

  const holdsProject = (dir: string): boolean => isWithin(loaded.sourceDir, dir) || isWithin(loaded.baseDir, dir);
  if (holdsProject(cacheDir)) {
    throw new ConfigError(`Refusing to delete cache ${cacheDir}: it contains the project or its sources`);
  }
  if (args.all && holdsProject(loaded.outputDir)) {
    throw new ConfigError(`Refusing to delete ${loaded.outputDir}: it contains the project or its sources`);
  }

  const cache = new CacheStore({ directory: cacheDir });
  await cache.load();
  const stats = await cache.stats(loaded.outputDir);
  log.debug(`Cache held ${stats.entries} entries, ${stats.live} with outputs present`);
  const cacheBytes = await cache.purge();
  log.info(`Removed cache ${cacheDir} (${formatSize(cacheBytes)})`);

  let outputBytes = 0;
  if (args.all) {
    outputBytes = await directorySize(loaded.outputDir);
    await fs.promises.rm(loaded.outputDir, { recursive: true, force: true });
    log.info(`Removed output ${loaded.outputDir} (${formatSize(outputBytes)})`);
  }
  return { cacheBytes, outputBytes };
}

export async function runClean(args: CleanArgs, ctx: CommandContext): Promise<number> {
  await cleanProject(args, ctx);
  return EXIT_OK;
}
