import * as fs from "fs";
import * as path from "path";
import type { AssetRecord, AtlasJob } from "../contracts";
import type { AtlasArgs } from "../cli/parseArgs";
import { isNotFound } from "../lib/dirSize";
import { UsageError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { CacheStore } from "../pipeline/cache";
import { EXIT_FAILED, EXIT_INTERRUPTED, EXIT_OK } from "../pipeline/report";
import { KIND_DEFAULTS, assetKindOf } from "../pipeline/rules";
import { readAssetRecord, scanSourceTree } from "../pipeline/scan";
import { Scheduler } from "../pipeline/scheduler";
import { createDefaultProcessors } from "../processors";
import { imageInfo } from "../processors/image";
import type { CommandContext } from "./context";

const log = createLogger("atlas");

/** Metadata path beside the atlas image: `sheet.png` -> `sheet.json`. */
export function metadataPathFor(output: string): string {
  return path.join(path.dirname(output), `${path.basename(output, path.extname(output))}.json`);
}

/** Pack every image under a directory into one atlas page plus JSON metadata. */
export async function runAtlas(args: AtlasArgs, ctx: CommandContext): Promise<number> {
  const isDir = await fs.promises.stat(args.input).then(
    (s) => s.isDirectory(),
    (err: unknown) => {
      if (isNotFound(err)) return false;
      throw err;
    }
  );
  if (!isDir) {
    throw new UsageError(`'atlas' expects a directory of images, got ${args.input}`);
  }

  const outputPath = path.resolve(args.output);
  const files = (await scanSourceTree(args.input, [outputPath]))
    .filter((f) => assetKindOf(f) === "image" && path.resolve(f) !== outputPath);
  if (files.length === 0) {
    log.warn(`No images found in ${args.input}`);
    return EXIT_OK;
  }

  const members: AssetRecord[] = [];
  for (const file of files) members.push(await readAssetRecord(args.input, file));

  const job: AtlasJob = {
    type: "atlas",
    id: path.basename(outputPath),
    groupId: path.basename(args.input),
    members,
    settings: {
      maxWidth: args.maxWidth,
      maxHeight: args.maxHeight,
      padding: args.padding,
      trim: args.trim,
      format: args.format,
      quality: KIND_DEFAULTS.imageQuality,
    },
    outputPath,
    metadataPath: path.resolve(args.json ?? metadataPathFor(outputPath)),
  };

  const scheduler = new Scheduler({
    cache: new CacheStore({ directory: path.dirname(outputPath), enabled: false }),
    processors: ctx.processors ?? createDefaultProcessors(),
    concurrency: 1,
  });
  const report = await scheduler.submit([job], ctx.signal);
  const [outcome] = report.outcomes;

  switch (outcome.status) {
    case "failed":
      log.error(outcome.error?.message ?? "unknown error");
      return EXIT_FAILED;
    case "cancelled":
      log.warn("Cancelled");
      return EXIT_INTERRUPTED;
    default: {
      const page = await imageInfo(await fs.promises.readFile(outputPath));
      log.info(`Packed ${members.length} sprites into ${page.width}x${page.height} ${outputPath}`);
      log.info(`Metadata: ${job.metadataPath}`);
      return EXIT_OK;
    }
  }
}
